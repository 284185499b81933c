import type { Axis } from "./axis/axis.js";
import type { CellCoordinate } from "./cell-coordinate/cell-coordinate.js";

/** A maximal line of one player's tokens, cells ordered end to end along the axis. */
export interface WinningRun {
  readonly axis: Axis;
  readonly cells: readonly CellCoordinate[];
}
