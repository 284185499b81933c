import type { Direction } from "./direction.js";

export const toDirectionBit = (direction: Direction): number => 1 << direction;
