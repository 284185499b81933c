import { Grid } from "../grid/grid.js";
import type { PlayerIndex } from "../player-index/player-index.js";
import type { GameState } from "./game-state.js";

export const cellOwner = (state: GameState, row: number, column: number): PlayerIndex | null =>
  Grid.getCellOwner(state.grid, { row, column });
