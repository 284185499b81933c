import type { GameConfig } from "../game-config/game-config.js";
import type { MoveResult } from "../move-result.js";
import { createGame } from "./create-game.js";
import type { GameState } from "./game-state.js";
import { submitMove } from "./submit-move.js";

export const players: GameConfig["players"] = [
  { name: "Ada", colour: "red" },
  { name: "Grace", colour: "yellow" }
];

export const newGame = (rows: number, columns: number, requiredRunLength?: number): GameState => {
  const created = createGame({ rows, columns, requiredRunLength, players });
  if (!created.ok) {
    throw new Error(created.error.message);
  }
  return created.value;
};

export const playAll = (
  start: GameState,
  columns: readonly number[]
): { readonly state: GameState; readonly results: readonly MoveResult[] } =>
  columns.reduce<{ readonly state: GameState; readonly results: readonly MoveResult[] }>(
    ({ state, results }, column) => {
      const next = submitMove(state, column);
      return { state: next.state, results: [...results, next.result] };
    },
    { state: start, results: [] }
  );
