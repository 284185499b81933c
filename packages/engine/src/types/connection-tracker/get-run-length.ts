import type { Axis } from "../axis/axis.js";
import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { getRunCells } from "./get-run-cells.js";

export const getRunLength = (tracker: ConnectionTracker, coordinate: CellCoordinate, axis: Axis): number =>
  getRunCells(tracker, coordinate, axis).length;
