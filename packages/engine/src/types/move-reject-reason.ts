/** Why a move was refused; the game state is left unchanged. */
export type MoveRejectReason = "invalid_column" | "column_full" | "game_over";
