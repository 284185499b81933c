import type { PlayerIndex } from "../player-index/player-index.js";

/**
 * Token storage for a board of `rows` by `columns` cells.
 *
 * `owners` is row-major with row 0 at the top. `heights` holds, per column, how
 * many tokens are stacked from the bottom row, so a column's occupied cells are
 * always rows `rows - heights[column]` through `rows - 1`.
 */
export interface Grid {
  readonly rows: number;
  readonly columns: number;
  readonly owners: readonly (PlayerIndex | null)[];
  readonly heights: readonly number[];
}
export * as Grid from "./public.js";
