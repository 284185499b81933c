import { Schema } from "@adobe/data/schema";

export const schema = {
  type: "string",
  enum: ["horizontal", "rising_diagonal", "vertical", "falling_diagonal"],
  description: "A line through the grid; a direction and its opposite share one axis"
} as const satisfies Schema;
