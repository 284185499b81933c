import { Schema } from "@adobe/data/schema";
import { schema } from "./direction-schema.js";

export type Direction = Schema.ToType<typeof schema>;
export * as Direction from "./public.js";
