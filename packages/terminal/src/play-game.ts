import "@dropline/engine/install-caches-polyfill";
import { Database } from "@adobe/data/ecs";
import { connectModelPlugin, GameConfig, GameState, type Player, type PlayerIndex } from "@dropline/engine";
import type { Ask, Print } from "./prompt/ask.js";
import { parseColumn } from "./prompt/parse-column.js";
import { setupPlayers } from "./prompt/setup-players.js";
import { describeOutcome } from "./render/describe-outcome.js";
import { describeRejection } from "./render/describe-rejection.js";
import { renderGrid } from "./render/render-grid.js";
import { Colour } from "./types/colour/colour.js";
import type { TerminalConfig } from "./types/terminal-config/terminal-config.js";

export interface PlayGameArgs {
  readonly ask: Ask;
  readonly print: Print;
  readonly printError: Print;
  readonly config: TerminalConfig;
  readonly palette: readonly Colour[];
}

export type PlayGameEnd = "finished" | "closed" | "configuration_error";

const tokenGlyph = "●";
const unpaintedGlyphs = ["x", "o"] as const;
const closedMessage = "The game has been closed!";

const toGlyph = (palette: readonly Colour[], player: Player, index: PlayerIndex): string => {
  const colour = palette.find((candidate) => candidate.name === player.colour);
  return colour === undefined ? unpaintedGlyphs[index] : Colour.paint(colour, tokenGlyph);
};

export const playGame = async ({ ask, print, printError, config, palette }: PlayGameArgs): Promise<PlayGameEnd> => {
  print("~~~~~~ WELCOME TO DROPLINE! ~~~~~~");

  // Checked before setup so nobody types a name into a game that cannot start.
  const settings = GameConfig.validateBoardSettings(config);
  if (!settings.ok) {
    printError(settings.error.message);
    return "configuration_error";
  }

  const players = await setupPlayers(ask, palette);
  if (players === null) {
    print(closedMessage);
    return "closed";
  }

  const db = Database.create(connectModelPlugin);
  db.transactions.startGame({ ...settings.value, players });
  const started = db.resources.game;
  if (started === null) {
    printError(db.resources.configurationError?.message ?? "The game could not be started.");
    return "configuration_error";
  }

  const glyphs = [toGlyph(palette, players[0], 0), toGlyph(palette, players[1], 1)] as const;
  print("The game has opened...");
  print(renderGrid(started, glyphs));

  let game = started;
  while (game.outcome.status === "in_progress") {
    const player = GameState.getPlayer(game, GameState.activePlayer(game));
    const input = await ask(`${player.name}, choose a column (1-${game.config.columns}) or q to quit: `);
    if (input === null || input.trim().toLowerCase() === "q") {
      print(closedMessage);
      return "closed";
    }

    const column = parseColumn(input);
    if (column === null) {
      print(describeRejection("invalid_column"));
      continue;
    }

    db.transactions.submitMove({ column });
    const move = db.resources.lastMove;
    if (move !== null && !move.accepted) {
      print(describeRejection(move.reason));
      continue;
    }
    game = db.resources.game ?? game;
    print(renderGrid(game, glyphs));
  }

  const summary = describeOutcome(game);
  if (summary !== null) {
    print(summary);
  }
  return "finished";
};
