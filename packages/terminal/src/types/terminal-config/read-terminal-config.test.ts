import { describe } from "riteway";
import { readTerminalConfig } from "./read-terminal-config.js";

describe("readTerminalConfig", async (assert) => {
  assert({
    given: "no environment variables",
    should: "use a 6 by 7 board needing 4 in a row",
    actual: readTerminalConfig({}),
    expected: { rows: 6, columns: 7, requiredRunLength: 4 }
  });

  assert({
    given: "all three variables",
    should: "read them as numbers",
    actual: readTerminalConfig({ DROPLINE_ROWS: "4", DROPLINE_COLUMNS: "5", DROPLINE_RUN_LENGTH: "3" }),
    expected: { rows: 4, columns: 5, requiredRunLength: 3 }
  });

  assert({
    given: "a row count that is not a number",
    should: "pass it on as NaN",
    actual: Number.isNaN(readTerminalConfig({ DROPLINE_ROWS: "many" }).rows),
    expected: true
  });
});
