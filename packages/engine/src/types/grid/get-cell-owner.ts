import { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { PlayerIndex } from "../player-index/player-index.js";
import type { Grid } from "./grid.js";

export const getCellOwner = (grid: Grid, coordinate: CellCoordinate): PlayerIndex | null =>
  CellCoordinate.isWithinBounds(grid, coordinate) ? grid.owners[CellCoordinate.toCellIndex(grid, coordinate)] : null;
