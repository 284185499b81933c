import { Axis } from "../axis/axis.js";
import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { WinningRun } from "../winning-run.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { getRunCells } from "./get-run-cells.js";

export const getWinningRun = (
  tracker: ConnectionTracker,
  coordinate: CellCoordinate,
  minRunLength: number
): WinningRun | null => {
  for (const axis of Axis.allAxes) {
    const cells = getRunCells(tracker, coordinate, axis);
    if (cells.length > 0 && cells.length >= minRunLength) {
      return { axis, cells };
    }
  }
  return null;
};
