import { Schema } from "@adobe/data/schema";
import { schema } from "./player-index-schema.js";

export type PlayerIndex = Schema.ToType<typeof schema>;
export * as PlayerIndex from "./public.js";
