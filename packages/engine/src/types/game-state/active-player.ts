import type { PlayerIndex } from "../player-index/player-index.js";
import type { GameState } from "./game-state.js";

export const activePlayer = (state: GameState): PlayerIndex => state.activePlayer;
