import type { PlayerIndex } from "./player-index.js";

export const otherPlayer = (player: PlayerIndex): PlayerIndex => (player === 0 ? 1 : 0);
