import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { Direction } from "./direction.js";
import { directionOffsets } from "./direction-constants.js";

export const stepToward = ({ row, column }: CellCoordinate, direction: Direction): CellCoordinate => {
  const { rowStep, columnStep } = directionOffsets[direction];
  return { row: row + rowStep, column: column + columnStep };
};
