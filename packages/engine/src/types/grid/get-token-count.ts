import type { Grid } from "./grid.js";

export const getTokenCount = (grid: Grid): number => grid.heights.reduce((sum, height) => sum + height, 0);
