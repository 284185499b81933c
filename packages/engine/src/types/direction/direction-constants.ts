import type { Direction } from "./direction.js";

export interface DirectionOffset {
  readonly rowStep: number;
  readonly columnStep: number;
}

// Indexed by Direction. Row steps are negative going up the grid.
export const directionOffsets: readonly DirectionOffset[] = [
  { rowStep: 0, columnStep: 1 },
  { rowStep: -1, columnStep: 1 },
  { rowStep: -1, columnStep: 0 },
  { rowStep: -1, columnStep: -1 },
  { rowStep: 0, columnStep: -1 },
  { rowStep: 1, columnStep: -1 },
  { rowStep: 1, columnStep: 0 },
  { rowStep: 1, columnStep: 1 }
];

export const allDirections: readonly Direction[] = [0, 1, 2, 3, 4, 5, 6, 7];
