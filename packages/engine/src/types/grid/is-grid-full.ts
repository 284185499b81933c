import type { Grid } from "./grid.js";

export const isGridFull = (grid: Grid): boolean => grid.heights.every((height) => height >= grid.rows);
