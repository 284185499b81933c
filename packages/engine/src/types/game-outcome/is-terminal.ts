import type { GameOutcome } from "./game-outcome.js";

export const isTerminal = (outcome: GameOutcome): boolean => outcome.status !== "in_progress";
