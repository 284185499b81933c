import { Schema } from "@adobe/data/schema";

export const schema = {
  type: "integer",
  enum: [0, 1],
  description: "Index of a player in the game, 0 moves first"
} as const satisfies Schema;
