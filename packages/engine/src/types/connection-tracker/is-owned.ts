import { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { ConnectionTracker } from "./connection-tracker.js";

export const isOwned = (tracker: ConnectionTracker, coordinate: CellCoordinate): boolean =>
  CellCoordinate.isWithinBounds(tracker, coordinate) && tracker.owned[CellCoordinate.toCellIndex(tracker, coordinate)];
