import { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import { Direction } from "../direction/direction.js";
import type { ConnectionTracker } from "./connection-tracker.js";

export const hasLink = (tracker: ConnectionTracker, coordinate: CellCoordinate, direction: Direction): boolean =>
  CellCoordinate.isWithinBounds(tracker, coordinate) &&
  (tracker.links[CellCoordinate.toCellIndex(tracker, coordinate)] & Direction.toDirectionBit(direction)) !== 0;
