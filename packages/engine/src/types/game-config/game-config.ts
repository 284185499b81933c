import type { Player } from "../player/player.js";

export interface BoardSettings {
  readonly rows: number;
  readonly columns: number;
  /** Tokens in a line needed to win. Defaults to 4. */
  readonly requiredRunLength?: number;
}

export interface GameConfig extends BoardSettings {
  readonly players: readonly [Player, Player];
}

/** A configuration that passed validation, with defaults filled in. */
export interface ResolvedGameConfig extends GameConfig {
  readonly requiredRunLength: number;
}
export * as GameConfig from "./public.js";
