export { schema } from "./direction-schema.js";
export { allDirections, directionOffsets, type DirectionOffset } from "./direction-constants.js";
export * from "./opposite-direction.js";
export * from "./step-toward.js";
export * from "./to-direction-bit.js";
