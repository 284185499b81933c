import type { Grid } from "./grid.js";

export const isValidColumn = (grid: Grid, column: number): boolean =>
  Number.isInteger(column) && column >= 0 && column < grid.columns;
