import type { Grid } from "./grid.js";
import { isValidColumn } from "./is-valid-column.js";

export const isColumnFull = (grid: Grid, column: number): boolean =>
  isValidColumn(grid, column) && grid.heights[column] >= grid.rows;
