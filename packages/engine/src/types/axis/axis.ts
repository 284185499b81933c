import { Schema } from "@adobe/data/schema";
import { schema } from "./axis-schema.js";

export type Axis = Schema.ToType<typeof schema>;
export * as Axis from "./public.js";
