export * from "./active-player.js";
export * from "./cell-owner.js";
export * from "./create-game.js";
export * from "./current-outcome.js";
export * from "./get-player.js";
export * from "./submit-move.js";
