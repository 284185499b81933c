import "../install-caches-polyfill.js";
import { Database } from "@adobe/data/ecs";
import type { GameConfig } from "../types/game-config/game-config.js";
import type { GameError } from "../types/game-error.js";
import { GameState } from "../types/game-state/game-state.js";
import type { MoveResult } from "../types/move-result.js";
import type { SubmitMoveArgs } from "../types/submit-move-args/submit-move-args.js";

/**
 * Owns the game being played. The game only changes inside a transaction, so a
 * token is never visible on the grid before its player's tracker knows about it.
 */
export const connectModelPlugin = Database.Plugin.create({
  resources: {
    game: { default: null as GameState | null },
    lastMove: { default: null as MoveResult | null },
    configurationError: { default: null as GameError | null }
  },
  transactions: {
    startGame: (t, config: GameConfig) => {
      const created = GameState.createGame(config);
      if (!created.ok) {
        t.resources.configurationError = created.error;
        return;
      }
      t.resources.game = created.value;
      t.resources.lastMove = null;
      t.resources.configurationError = null;
    },
    submitMove: (t, { column }: SubmitMoveArgs) => {
      const game = t.resources.game;
      if (game === null) return;
      const { state, result } = GameState.submitMove(game, column);
      t.resources.game = state;
      t.resources.lastMove = result;
    }
  }
});

export type ConnectModelDatabase = Database.FromPlugin<typeof connectModelPlugin>;
