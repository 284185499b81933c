import { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import { Direction } from "../direction/direction.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { isOwned } from "./is-owned.js";

export interface RecordPlacementResult {
  readonly tracker: ConnectionTracker;
  /** Neighbours that gained a link to the placed cell, in direction order. */
  readonly linked: readonly CellCoordinate[];
}

export const recordPlacement = (tracker: ConnectionTracker, coordinate: CellCoordinate): RecordPlacementResult => {
  // Cells are placed once; anything else is not a placement.
  if (!CellCoordinate.isWithinBounds(tracker, coordinate) || isOwned(tracker, coordinate)) {
    return { tracker, linked: [] };
  }

  const owned = [...tracker.owned];
  const links = [...tracker.links];
  const linked: CellCoordinate[] = [];
  let placedLinks = 0;

  for (const direction of Direction.allDirections) {
    const neighbour = Direction.stepToward(coordinate, direction);
    if (!isOwned(tracker, neighbour)) continue;
    placedLinks |= Direction.toDirectionBit(direction);
    links[CellCoordinate.toCellIndex(tracker, neighbour)] |= Direction.toDirectionBit(
      Direction.oppositeDirection(direction)
    );
    linked.push(neighbour);
  }

  const index = CellCoordinate.toCellIndex(tracker, coordinate);
  owned[index] = true;
  links[index] = placedLinks;

  return { tracker: { ...tracker, owned, links }, linked };
};
