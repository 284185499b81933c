import { Schema } from "@adobe/data/schema";

export const schema = {
  type: "integer",
  minimum: 0,
  maximum: 7,
  description: "One of the 8 neighbour offsets, counter-clockwise from east: E, NE, N, NW, W, SW, S, SE"
} as const satisfies Schema;
