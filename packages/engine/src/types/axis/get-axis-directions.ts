import type { Direction } from "../direction/direction.js";
import type { Axis } from "./axis.js";

// Forward direction first: E, NE, N, NW with W, SW, S, SE as their opposites.
const axisDirections: Readonly<Record<Axis, readonly [Direction, Direction]>> = {
  horizontal: [0, 4],
  rising_diagonal: [1, 5],
  vertical: [2, 6],
  falling_diagonal: [3, 7]
};

export const allAxes: readonly Axis[] = ["horizontal", "rising_diagonal", "vertical", "falling_diagonal"];

export const getAxisDirections = (axis: Axis): readonly [Direction, Direction] => axisDirections[axis];
