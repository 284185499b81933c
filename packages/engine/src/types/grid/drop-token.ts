import { CellCoordinate } from "../cell-coordinate/cell-coordinate.js";
import type { PlayerIndex } from "../player-index/player-index.js";
import type { MoveRejectReason } from "../move-reject-reason.js";
import type { Grid } from "./grid.js";
import { getLowestEmptyRow } from "./get-lowest-empty-row.js";
import { isValidColumn } from "./is-valid-column.js";

export interface DropTokenArgs {
  readonly grid: Grid;
  readonly column: number;
  readonly owner: PlayerIndex;
}

export type DropTokenResult =
  | { readonly ok: true; readonly grid: Grid; readonly placedAt: CellCoordinate }
  | { readonly ok: false; readonly reason: Extract<MoveRejectReason, "invalid_column" | "column_full"> };

export const dropToken = ({ grid, column, owner }: DropTokenArgs): DropTokenResult => {
  if (!isValidColumn(grid, column)) {
    return { ok: false, reason: "invalid_column" };
  }
  const row = getLowestEmptyRow(grid, column);
  if (row === null) {
    return { ok: false, reason: "column_full" };
  }

  const placedAt: CellCoordinate = { row, column };
  const owners = [...grid.owners];
  owners[CellCoordinate.toCellIndex(grid, placedAt)] = owner;
  const heights = [...grid.heights];
  heights[column] += 1;

  return { ok: true, grid: { ...grid, owners, heights }, placedAt };
};
