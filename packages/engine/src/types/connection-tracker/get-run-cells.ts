import { Axis } from "../axis/axis.js";
import type { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { ConnectionTracker } from "./connection-tracker.js";
import { isOwned } from "./is-owned.js";
import { walkLinks } from "./walk-links.js";

export const getRunCells = (
  tracker: ConnectionTracker,
  coordinate: CellCoordinate,
  axis: Axis
): readonly CellCoordinate[] => {
  if (!isOwned(tracker, coordinate)) return [];
  const [forward, backward] = Axis.getAxisDirections(axis);
  return [...walkLinks(tracker, coordinate, backward).reverse(), coordinate, ...walkLinks(tracker, coordinate, forward)];
};
