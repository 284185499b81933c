import { GameState } from "@dropline/engine";

const emptyCell = ".";

/**
 * Draws the grid top row first, followed by the 1-based column numbers players
 * type. Glyphs are assumed to occupy a single terminal column.
 */
export const renderGrid = (state: GameState, glyphs: readonly [string, string]): string => {
  const { rows, columns } = state.config;
  const width = String(columns).length;
  const indent = " ".repeat(width - 1);

  const lines: string[] = [];
  for (let row = 0; row < rows; row++) {
    const cells: string[] = [];
    for (let column = 0; column < columns; column++) {
      const owner = GameState.cellOwner(state, row, column);
      cells.push(indent + (owner === null ? emptyCell : glyphs[owner]));
    }
    lines.push(cells.join(" "));
  }
  lines.push(Array.from({ length: columns }, (_, column) => String(column + 1).padStart(width)).join(" "));
  return lines.join("\n");
};
