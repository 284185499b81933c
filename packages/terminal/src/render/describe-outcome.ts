import { GameState } from "@dropline/engine";

export const describeOutcome = (state: GameState): string | null => {
  const outcome = GameState.currentOutcome(state);
  switch (outcome.status) {
    case "won":
      return `Player ${GameState.getPlayer(state, outcome.winner).name} wins the game!`;
    case "tied":
      return "The game ends in a tragic tie!";
    case "in_progress":
      return null;
  }
};
