import type { GameOutcome } from "../game-outcome/game-outcome.js";
import type { GameState } from "./game-state.js";

export const currentOutcome = (state: GameState): GameOutcome => state.outcome;
