export * from "./create-grid.js";
export * from "./drop-token.js";
export * from "./get-cell-owner.js";
export * from "./get-lowest-empty-row.js";
export * from "./get-token-count.js";
export * from "./is-column-full.js";
export * from "./is-grid-full.js";
export * from "./is-valid-column.js";
