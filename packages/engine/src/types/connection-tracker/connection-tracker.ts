/**
 * One player's adjacency graph over the cells they own.
 *
 * Both arrays are row-major like the grid. `links[i]` is a bitset over
 * Direction: bit `d` is set when the neighbour one step in direction `d`
 * is owned by the same player. Links are always recorded on both cells and are
 * never removed, since tokens never leave the board.
 */
export interface ConnectionTracker {
  readonly rows: number;
  readonly columns: number;
  readonly owned: readonly boolean[];
  readonly links: readonly number[];
}
export * as ConnectionTracker from "./public.js";
