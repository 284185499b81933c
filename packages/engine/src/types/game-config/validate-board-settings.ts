import type { GameError } from "../game-error.js";
import { defaultRunLength } from "./game-config-constants.js";
import type { BoardSettings } from "./game-config.js";

export type ValidateBoardSettingsResult =
  | { readonly ok: true; readonly value: Required<BoardSettings> }
  | { readonly ok: false; readonly error: GameError };

export interface BoardSettingsProblem {
  readonly field: keyof BoardSettings;
  readonly value: number;
  readonly message: string;
}

const fieldLabels: Readonly<Record<keyof BoardSettings, string>> = {
  rows: "the number of rows",
  columns: "the number of columns",
  requiredRunLength: "the required run length"
};

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

export const validateBoardSettings = (settings: BoardSettings): ValidateBoardSettingsResult => {
  const value: Required<BoardSettings> = {
    rows: settings.rows,
    columns: settings.columns,
    requiredRunLength: settings.requiredRunLength ?? defaultRunLength
  };

  const problems = (["rows", "columns", "requiredRunLength"] as const)
    .filter((field) => !isPositiveInteger(value[field]))
    .map(
      (field): BoardSettingsProblem => ({
        field,
        value: value[field],
        message: `Please enter a value for ${fieldLabels[field]} that is an integer greater than 0.`
      })
    );

  if (problems.length > 0) {
    return {
      ok: false,
      error: {
        code: "invalid_configuration",
        message: problems.map((problem) => problem.message).join(" "),
        details: problems
      }
    };
  }

  return { ok: true, value };
};
