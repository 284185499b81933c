import type { PlayerIndex } from "../player-index/player-index.js";
import type { WinningRun } from "../winning-run.js";

export type GameOutcome =
  | { readonly status: "in_progress" }
  | { readonly status: "won"; readonly winner: PlayerIndex; readonly run: WinningRun }
  | { readonly status: "tied" };

export type GameStatus = GameOutcome["status"];
export * as GameOutcome from "./public.js";
