import type { GridSize } from "../cell-coordinate/grid-size.js";
import type { Grid } from "./grid.js";

export const createGrid = ({ rows, columns }: GridSize): Grid => ({
  rows,
  columns,
  owners: new Array<null>(rows * columns).fill(null),
  heights: new Array<number>(columns).fill(0)
});
