import { GameConfig } from "@dropline/engine";
import type { TerminalConfig } from "./terminal-config.js";

/** Unset variables fall back to a classic 6 by 7 board; bad values become NaN for the engine to reject. */
export const readTerminalConfig = (env: NodeJS.ProcessEnv): TerminalConfig => ({
  rows: Number(env.DROPLINE_ROWS ?? GameConfig.defaultRows),
  columns: Number(env.DROPLINE_COLUMNS ?? GameConfig.defaultColumns),
  requiredRunLength: Number(env.DROPLINE_RUN_LENGTH ?? GameConfig.defaultRunLength)
});
