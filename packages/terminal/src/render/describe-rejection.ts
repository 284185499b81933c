import type { MoveRejectReason } from "@dropline/engine";

const messages: Readonly<Record<MoveRejectReason, string>> = {
  invalid_column: "Please place your coin in a valid column!",
  column_full: "That column is full, pick another!",
  game_over: "The game is already over!"
};

export const describeRejection = (reason: MoveRejectReason): string => messages[reason];
