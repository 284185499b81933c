export { schema } from "./axis-schema.js";
export * from "./get-axis-directions.js";
