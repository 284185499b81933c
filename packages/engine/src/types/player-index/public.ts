export { schema } from "./player-index-schema.js";
export * from "./other-player.js";
