export * from "./game-config-constants.js";
export * from "./validate-board-settings.js";
export * from "./validate-game-config.js";
