import type { CellCoordinate } from "./cell-coordinate.js";
import type { GridSize } from "./grid-size.js";

export const isWithinBounds = ({ rows, columns }: GridSize, { row, column }: CellCoordinate): boolean =>
  Number.isInteger(row) && Number.isInteger(column) && row >= 0 && row < rows && column >= 0 && column < columns;
