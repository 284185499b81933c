import type { ConnectionTracker } from "../connection-tracker/connection-tracker.js";
import type { ResolvedGameConfig } from "../game-config/game-config.js";
import type { GameOutcome } from "../game-outcome/game-outcome.js";
import type { Grid } from "../grid/grid.js";
import type { PlayerIndex } from "../player-index/player-index.js";

/**
 * A game between exactly two players. Values are never mutated; every move
 * produces a new state through `submitMove`.
 *
 * `trackers[i]` is the adjacency bookkeeping for player `i`. `placedTokens`
 * counts accepted moves and never exceeds `rows * columns`. Once `outcome`
 * leaves `in_progress` neither it nor `activePlayer` changes again.
 */
export interface GameState {
  readonly config: ResolvedGameConfig;
  readonly grid: Grid;
  readonly trackers: readonly [ConnectionTracker, ConnectionTracker];
  readonly activePlayer: PlayerIndex;
  readonly placedTokens: number;
  readonly outcome: GameOutcome;
}
export * as GameState from "./public.js";
