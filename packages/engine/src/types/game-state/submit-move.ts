import { ConnectionTracker } from "../connection-tracker/connection-tracker.js";
import type { GameOutcome } from "../game-outcome/game-outcome.js";
import { Grid } from "../grid/grid.js";
import type { MoveRejectReason } from "../move-reject-reason.js";
import type { MoveResult } from "../move-result.js";
import { PlayerIndex } from "../player-index/player-index.js";
import { SubmitMoveArgs } from "../submit-move-args/submit-move-args.js";
import type { GameState } from "./game-state.js";

export interface SubmitMoveOutput {
  readonly state: GameState;
  readonly result: MoveResult;
}

const reject = (state: GameState, reason: MoveRejectReason): SubmitMoveOutput => ({
  state,
  result: { accepted: false, reason, placedAt: null, outcome: state.outcome }
});

export const submitMove = (state: GameState, column: number): SubmitMoveOutput => {
  const validation = SubmitMoveArgs.canSubmitMove({ state, column });
  if (!validation.ok) {
    return reject(state, validation.reason);
  }

  const drop = Grid.dropToken({ grid: state.grid, column, owner: state.activePlayer });
  if (!drop.ok) {
    return reject(state, drop.reason);
  }

  const { tracker } = ConnectionTracker.recordPlacement(state.trackers[state.activePlayer], drop.placedAt);
  const trackers =
    state.activePlayer === 0 ? ([tracker, state.trackers[1]] as const) : ([state.trackers[0], tracker] as const);

  const run = ConnectionTracker.getWinningRun(tracker, drop.placedAt, state.config.requiredRunLength);
  const placedTokens = state.placedTokens + 1;
  const outcome: GameOutcome =
    run !== null
      ? { status: "won", winner: state.activePlayer, run }
      : placedTokens === state.config.rows * state.config.columns
        ? { status: "tied" }
        : { status: "in_progress" };

  return {
    state: {
      ...state,
      grid: drop.grid,
      trackers,
      activePlayer: outcome.status === "in_progress" ? PlayerIndex.otherPlayer(state.activePlayer) : state.activePlayer,
      placedTokens,
      outcome
    },
    result: { accepted: true, placedAt: drop.placedAt, outcome }
  };
};
