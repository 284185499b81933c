import type { CellCoordinate } from "./cell-coordinate/cell-coordinate.js";
import type { GameOutcome } from "./game-outcome/game-outcome.js";
import type { MoveRejectReason } from "./move-reject-reason.js";

export type MoveResult =
  | { readonly accepted: true; readonly placedAt: CellCoordinate; readonly outcome: GameOutcome }
  | {
      readonly accepted: false;
      readonly reason: MoveRejectReason;
      readonly placedAt: null;
      readonly outcome: GameOutcome;
    };
