import "@dropline/engine/install-caches-polyfill";
import { GameState } from "@dropline/engine";
import { describe } from "riteway";
import { describeOutcome } from "./describe-outcome.js";
import { describeRejection } from "./describe-rejection.js";
import { renderGrid } from "./render-grid.js";

const newGame = (rows: number, columns: number, requiredRunLength: number): GameState => {
  const created = GameState.createGame({
    rows,
    columns,
    requiredRunLength,
    players: [
      { name: "Ada", colour: "red" },
      { name: "Grace", colour: "blue" }
    ]
  });
  if (!created.ok) {
    throw new Error(created.error.message);
  }
  return created.value;
};

const play = (state: GameState, columns: readonly number[]): GameState =>
  columns.reduce((current, column) => GameState.submitMove(current, column).state, state);

describe("renderGrid", async (assert) => {
  assert({
    given: "a 2 by 3 board with one token for each player",
    should: "draw the top row first and number the columns",
    actual: renderGrid(play(newGame(2, 3, 3), [0, 2]), ["A", "B"]),
    expected: [". . .", "A . B", "1 2 3"].join("\n")
  });

  assert({
    given: "a board with more than 9 columns",
    should: "right-align cells under two-digit column numbers",
    actual: renderGrid(play(newGame(1, 10, 4), [9]), ["A", "B"]).split("\n"),
    expected: [" .  .  .  .  .  .  .  .  .  A", " 1  2  3  4  5  6  7  8  9 10"]
  });
});

describe("describeOutcome", async (assert) => {
  assert({
    given: "a game in progress",
    should: "return null",
    actual: describeOutcome(newGame(6, 7, 4)),
    expected: null
  });

  assert({
    given: "a game won by the first player",
    should: "name the winner",
    actual: describeOutcome(play(newGame(4, 4, 3), [0, 3, 1, 3, 2])),
    expected: "Player Ada wins the game!"
  });

  assert({
    given: "a full board without a winner",
    should: "announce a tie",
    actual: describeOutcome(play(newGame(2, 2, 3), [0, 0, 1, 1])),
    expected: "The game ends in a tragic tie!"
  });
});

describe("describeRejection", async (assert) => {
  assert({
    given: "a full column",
    should: "ask for another column",
    actual: describeRejection("column_full"),
    expected: "That column is full, pick another!"
  });

  assert({
    given: "a column outside the board",
    should: "ask for a valid column",
    actual: describeRejection("invalid_column"),
    expected: "Please place your coin in a valid column!"
  });
});
