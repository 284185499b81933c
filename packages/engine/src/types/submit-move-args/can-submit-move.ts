import { GameOutcome } from "../game-outcome/game-outcome.js";
import type { GameState } from "../game-state/game-state.js";
import { Grid } from "../grid/grid.js";
import type { MoveRejectReason } from "../move-reject-reason.js";

export interface CanSubmitMoveArgs {
  readonly state: GameState;
  readonly column: number;
}

export type CanSubmitMoveResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: MoveRejectReason };

export const canSubmitMove = ({ state, column }: CanSubmitMoveArgs): CanSubmitMoveResult => {
  if (GameOutcome.isTerminal(state.outcome)) {
    return { ok: false, reason: "game_over" };
  }
  if (!Grid.isValidColumn(state.grid, column)) {
    return { ok: false, reason: "invalid_column" };
  }
  if (Grid.isColumnFull(state.grid, column)) {
    return { ok: false, reason: "column_full" };
  }
  return { ok: true };
};
