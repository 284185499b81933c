import { describe } from "riteway";
import type { GameConfig } from "./game-config.js";
import { validateGameConfig, type ValidateGameConfigResult } from "./validate-game-config.js";

const players: GameConfig["players"] = [
  { name: "Ada", colour: "red" },
  { name: "Grace", colour: "blue" }
];

const errorCode = (result: ValidateGameConfigResult): string | null => (result.ok ? null : result.error.code);

describe("validateGameConfig", async (assert) => {
  assert({
    given: "a config without a run length",
    should: "default the run length to 4",
    actual: validateGameConfig({ rows: 6, columns: 7, players }),
    expected: { ok: true, value: { rows: 6, columns: 7, players, requiredRunLength: 4 } }
  });

  assert({
    given: "an explicit run length",
    should: "keep it",
    actual: validateGameConfig({ rows: 4, columns: 4, requiredRunLength: 3, players }),
    expected: { ok: true, value: { rows: 4, columns: 4, players, requiredRunLength: 3 } }
  });

  assert({
    given: "zero rows",
    should: "fail with a message about the rows",
    actual: validateGameConfig({ rows: 0, columns: 7, players }),
    expected: {
      ok: false,
      error: {
        code: "invalid_configuration",
        message: "Please enter a value for the number of rows that is an integer greater than 0.",
        details: [
          {
            field: "rows",
            value: 0,
            message: "Please enter a value for the number of rows that is an integer greater than 0."
          }
        ]
      }
    }
  });

  const invalid = validateGameConfig({ rows: 6, columns: -2, requiredRunLength: 0, players });

  assert({
    given: "negative columns and a zero run length",
    should: "report both problems in one message",
    actual: invalid.ok ? null : invalid.error.message,
    expected:
      "Please enter a value for the number of columns that is an integer greater than 0. " +
      "Please enter a value for the required run length that is an integer greater than 0."
  });

  assert({
    given: "a fractional row count",
    should: "fail with invalid_configuration",
    actual: errorCode(validateGameConfig({ rows: 2.5, columns: 7, players })),
    expected: "invalid_configuration"
  });

  assert({
    given: "a row count that is not a number",
    should: "fail with invalid_configuration",
    actual: errorCode(validateGameConfig({ rows: Number.NaN, columns: 7, players })),
    expected: "invalid_configuration"
  });
});
