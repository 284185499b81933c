export interface SubmitMoveArgs {
  /** Zero-based, counted from the left edge of the grid. */
  readonly column: number;
}
export * as SubmitMoveArgs from "./public.js";
