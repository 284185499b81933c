export * from "./create-connection-tracker.js";
export * from "./get-run-cells.js";
export * from "./get-run-length.js";
export * from "./get-winning-run.js";
export * from "./has-link.js";
export * from "./has-winning-run.js";
export * from "./is-owned.js";
export * from "./record-placement.js";
export * from "./walk-links.js";
