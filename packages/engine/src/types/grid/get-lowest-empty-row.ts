import type { Grid } from "./grid.js";
import { isValidColumn } from "./is-valid-column.js";

export const getLowestEmptyRow = (grid: Grid, column: number): number | null => {
  if (!isValidColumn(grid, column)) return null;
  const row = grid.rows - 1 - grid.heights[column];
  return row >= 0 ? row : null;
};
