export * from "./can-submit-move.js";
