import type { PlayerIndex } from "../player-index/player-index.js";
import type { Player } from "../player/player.js";
import type { GameState } from "./game-state.js";

export const getPlayer = (state: GameState, index: PlayerIndex): Player => state.config.players[index];
