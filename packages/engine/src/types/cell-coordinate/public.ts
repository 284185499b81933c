export type { GridSize } from "./grid-size.js";
export * from "./is-within-bounds.js";
export * from "./to-cell-index.js";
