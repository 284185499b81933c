import type { GridSize } from "../cell-coordinate/grid-size.js";
import type { ConnectionTracker } from "./connection-tracker.js";

export const createConnectionTracker = ({ rows, columns }: GridSize): ConnectionTracker => ({
  rows,
  columns,
  owned: new Array<boolean>(rows * columns).fill(false),
  links: new Array<number>(rows * columns).fill(0)
});
