/** Row 0 is the top of the grid; tokens settle on the highest row index. */
export interface CellCoordinate {
  readonly row: number;
  readonly column: number;
}
export * as CellCoordinate from "./public.js";
