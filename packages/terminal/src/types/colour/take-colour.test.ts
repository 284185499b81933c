import { describe } from "riteway";
import type { Colour } from "./colour.js";
import { paint } from "./paint.js";
import { takeColour } from "./take-colour.js";

const red: Colour = { name: "red", rgb: [255, 0, 0] };
const blue: Colour = { name: "blue", rgb: [2, 145, 247] };

describe("takeColour", async (assert) => {
  assert({
    given: "an available colour typed with spaces and capitals",
    should: "take it and remove it from the choices",
    actual: takeColour([red, blue], " Blue "),
    expected: { ok: true, colour: blue, remaining: [red] }
  });

  assert({
    given: "a colour that is not offered",
    should: "refuse it",
    actual: takeColour([red], "blue"),
    expected: { ok: false }
  });
});

describe("paint", async (assert) => {
  assert({
    given: "a colour and some text",
    should: "wrap the text in a 24-bit foreground escape",
    actual: paint(blue, "o"),
    expected: "\u001b[38;2;2;145;247mo\u001b[39m"
  });
});
