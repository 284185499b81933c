import { describe } from "riteway";
import { createGrid } from "./create-grid.js";
import { getCellOwner } from "./get-cell-owner.js";
import { getTokenCount } from "./get-token-count.js";
import type { Grid } from "./grid.js";
import { isGridFull } from "./is-grid-full.js";

const grid: Grid = {
  rows: 2,
  columns: 2,
  owners: [null, null, 1, 0],
  heights: [1, 1]
};

const full: Grid = {
  rows: 2,
  columns: 2,
  owners: [0, 1, 1, 0],
  heights: [2, 2]
};

describe("getTokenCount", async (assert) => {
  assert({
    given: "an empty grid",
    should: "return 0",
    actual: getTokenCount(createGrid({ rows: 3, columns: 3 })),
    expected: 0
  });

  assert({
    given: "a grid with one token per column",
    should: "count both tokens",
    actual: getTokenCount(grid),
    expected: 2
  });
});

describe("isGridFull", async (assert) => {
  assert({
    given: "a grid with empty cells",
    should: "return false",
    actual: isGridFull(grid),
    expected: false
  });

  assert({
    given: "a grid with every column at full height",
    should: "return true",
    actual: isGridFull(full),
    expected: true
  });
});

describe("getCellOwner", async (assert) => {
  assert({
    given: "an occupied cell",
    should: "return its owner",
    actual: getCellOwner(grid, { row: 1, column: 0 }),
    expected: 1
  });

  assert({
    given: "an empty cell",
    should: "return null",
    actual: getCellOwner(grid, { row: 0, column: 1 }),
    expected: null
  });

  assert({
    given: "a cell outside the grid",
    should: "return null",
    actual: getCellOwner(grid, { row: 2, column: 0 }),
    expected: null
  });
});
