import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import { Direction } from "../direction/direction.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { hasLink } from "./has-link.js";

/**
 * Cells reached by repeatedly following the link in exactly `direction`,
 * nearest first. Links in any other direction are never followed.
 */
export const walkLinks = (
  tracker: ConnectionTracker,
  from: CellCoordinate,
  direction: Direction
): CellCoordinate[] => {
  const cells: CellCoordinate[] = [];
  let current = from;
  while (hasLink(tracker, current, direction)) {
    current = Direction.stepToward(current, direction);
    cells.push(current);
  }
  return cells;
};
