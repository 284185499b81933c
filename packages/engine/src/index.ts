export { Axis } from "./types/axis/axis.js";
export { CellCoordinate } from "./types/cell-coordinate/cell-coordinate.js";
export { ConnectionTracker } from "./types/connection-tracker/connection-tracker.js";
export { Direction } from "./types/direction/direction.js";
export { GameConfig, type BoardSettings, type ResolvedGameConfig } from "./types/game-config/game-config.js";
export type { GameError } from "./types/game-error.js";
export { GameOutcome, type GameStatus } from "./types/game-outcome/game-outcome.js";
export { GameState } from "./types/game-state/game-state.js";
export { Grid } from "./types/grid/grid.js";
export type { MoveRejectReason } from "./types/move-reject-reason.js";
export type { MoveResult } from "./types/move-result.js";
export { PlayerIndex } from "./types/player-index/player-index.js";
export type { Player } from "./types/player/player.js";
export { SubmitMoveArgs } from "./types/submit-move-args/submit-move-args.js";
export type { WinningRun } from "./types/winning-run.js";

export { connectModelPlugin, type ConnectModelDatabase } from "./plugins/connect-model-plugin.js";
