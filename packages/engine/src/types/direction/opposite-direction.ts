import type { Direction } from "./direction.js";

export const oppositeDirection = (direction: Direction): Direction => (direction + 4) % 8;
