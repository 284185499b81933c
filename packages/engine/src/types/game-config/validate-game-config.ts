import type { GameError } from "../game-error.js";
import type { GameConfig, ResolvedGameConfig } from "./game-config.js";
import { validateBoardSettings } from "./validate-board-settings.js";

export type ValidateGameConfigResult =
  | { readonly ok: true; readonly value: ResolvedGameConfig }
  | { readonly ok: false; readonly error: GameError };

export const validateGameConfig = (config: GameConfig): ValidateGameConfigResult => {
  const settings = validateBoardSettings(config);
  if (!settings.ok) {
    return settings;
  }
  return { ok: true, value: { ...config, requiredRunLength: settings.value.requiredRunLength } };
};
