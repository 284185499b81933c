import type { CellCoordinate } from "./cell-coordinate.js";
import type { GridSize } from "./grid-size.js";

export const toCellIndex = ({ columns }: GridSize, { row, column }: CellCoordinate): number => row * columns + column;
