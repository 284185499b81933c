import "@dropline/engine/install-caches-polyfill";
import { describe } from "riteway";
import { playGame, type PlayGameArgs } from "./play-game.js";
import { createScriptedAsk } from "./prompt/scripted-ask.js";
import type { Colour } from "./types/colour/colour.js";

const palette: readonly Colour[] = [
  { name: "red", rgb: [255, 0, 0] },
  { name: "blue", rgb: [2, 145, 247] }
];

const setup = ["Ada", "red", "Grace", "blue"];

const run = async (
  answers: readonly string[],
  config: PlayGameArgs["config"] = { rows: 4, columns: 4, requiredRunLength: 3 }
) => {
  const printed: string[] = [];
  const errors: string[] = [];
  const script = createScriptedAsk(answers);
  const end = await playGame({
    ask: script.ask,
    print: (line) => printed.push(line),
    printError: (line) => errors.push(line),
    config,
    palette
  });
  return { end, printed, errors, asked: script.asked };
};

describe("playGame", async (assert) => {
  const won = await run([...setup, "1", "4", "2", "4", "3"]);

  assert({
    given: "the first player completing a row of 3",
    should: "finish the game",
    actual: won.end,
    expected: "finished"
  });

  assert({
    given: "the first player completing a row of 3",
    should: "announce the winner last",
    actual: won.printed[won.printed.length - 1],
    expected: "Player Ada wins the game!"
  });

  assert({
    given: "five accepted moves",
    should: "print the banner, the opening board, one board per move and the result",
    actual: won.printed.length,
    expected: 9
  });

  assert({
    given: "the opening of a game",
    should: "prompt the first player for a column",
    actual: won.asked[4],
    expected: "Ada, choose a column (1-4) or q to quit: "
  });

  const tied = await run([...setup, "1", "1", "2", "2"], { rows: 2, columns: 2, requiredRunLength: 3 });

  assert({
    given: "a 2 by 2 board filled without a winner",
    should: "announce a tie",
    actual: tied.printed[tied.printed.length - 1],
    expected: "The game ends in a tragic tie!"
  });

  const rejected = await run([...setup, "left", "9", "1", "1", "1", "1", "1"]);

  assert({
    given: "unparsable input, an out-of-range column and an overfilled column",
    should: "explain each rejection and close when input ends",
    actual: rejected.printed.filter((line) => !line.includes("\n") && !line.startsWith("~") && line !== "The game has opened..."),
    expected: [
      "Please place your coin in a valid column!",
      "Please place your coin in a valid column!",
      "That column is full, pick another!",
      "The game has been closed!"
    ]
  });

  assert({
    given: "a rejected move",
    should: "keep asking the same player",
    actual: rejected.asked.slice(4, 6),
    expected: ["Ada, choose a column (1-4) or q to quit: ", "Ada, choose a column (1-4) or q to quit: "]
  });

  const quit = await run([...setup, "q"]);

  assert({
    given: "a player typing q",
    should: "close the game",
    actual: [quit.end, quit.printed[quit.printed.length - 1]],
    expected: ["closed", "The game has been closed!"]
  });

  const invalid = await run(setup, { rows: 0, columns: 7, requiredRunLength: 4 });

  assert({
    given: "a board with zero rows",
    should: "stop before asking for players",
    actual: [invalid.end, invalid.asked.length],
    expected: ["configuration_error", 0]
  });

  assert({
    given: "a board with zero rows",
    should: "report the problem",
    actual: invalid.errors,
    expected: ["Please enter a value for the number of rows that is an integer greater than 0."]
  });
});
