export * from "./load-palette.js";
export * from "./paint.js";
export * from "./take-colour.js";
