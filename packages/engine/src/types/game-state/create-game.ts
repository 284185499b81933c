import { ConnectionTracker } from "../connection-tracker/connection-tracker.js";
import { GameConfig } from "../game-config/game-config.js";
import type { GameError } from "../game-error.js";
import { Grid } from "../grid/grid.js";
import type { GameState } from "./game-state.js";

export type CreateGameResult =
  | { readonly ok: true; readonly value: GameState }
  | { readonly ok: false; readonly error: GameError };

export const createGame = (config: GameConfig): CreateGameResult => {
  const validation = GameConfig.validateGameConfig(config);
  if (!validation.ok) {
    return validation;
  }

  const resolved = validation.value;
  return {
    ok: true,
    value: {
      config: resolved,
      grid: Grid.createGrid(resolved),
      trackers: [ConnectionTracker.createConnectionTracker(resolved), ConnectionTracker.createConnectionTracker(resolved)],
      activePlayer: 0,
      placedTokens: 0,
      outcome: { status: "in_progress" }
    }
  };
};
