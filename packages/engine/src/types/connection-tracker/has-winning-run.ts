import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { getWinningRun } from "./get-winning-run.js";

export const hasWinningRun = (tracker: ConnectionTracker, coordinate: CellCoordinate, minRunLength: number): boolean =>
  getWinningRun(tracker, coordinate, minRunLength) !== null;
