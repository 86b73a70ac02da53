/**
 * Plain-text grids: one line per row, one symbol per cell.
 */

import { AutomatonError, Err, Ok, type Result } from "@cellforge/contracts";
import { type Cell, CellCode, cellToSymbol, Grid, type ReadonlyCellGrid, symbolToCell } from "../core/grid";

/**
 * Split text into lines, dropping carriage returns and one trailing empty
 * line.
 */
function splitLines(text: string): string[] {
  const lines = text.replace(/\r/g, "").split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a text grid. The grid is as wide as the longest line; shorter lines
 * are padded with empty cells.
 *
 * @example
 * ```typescript
 * const grid = gridFromText("X \n  \n").getOrThrow(); // 2x2, sand at (0, 0)
 * ```
 */
export function gridFromText(text: string): Result<Grid, AutomatonError> {
  const lines = splitLines(text);
  const cols = lines.reduce((max, line) => Math.max(max, line.length), 0);
  const rows: Cell[][] = [];

  for (let row = 0; row < lines.length; row++) {
    const line = lines[row];
    const cells: Cell[] = new Array<Cell>(cols).fill(CellCode.EMPTY);
    for (let col = 0; col < line.length; col++) {
      const symbol = line[col];
      const cell = symbolToCell(symbol);
      if (cell === undefined) {
        return Err(
          new AutomatonError("SYMBOL_UNKNOWN", `Unknown symbol "${symbol}" at line ${row + 1}, column ${col + 1}`, {
            symbol,
            row,
            col,
          }),
        );
      }
      cells[col] = cell;
    }
    rows.push(cells);
  }

  return Grid.fromRows(rows);
}

/**
 * Render one row of cells as symbols.
 */
export function cellsToText(cells: readonly Cell[]): Result<string, AutomatonError> {
  let text = "";
  for (const cell of cells) {
    const symbol = cellToSymbol(cell);
    if (symbol === undefined) {
      return Err(
        new AutomatonError("SYMBOL_UNKNOWN", `Cell value ${cell} has no text symbol`, { value: cell }),
      );
    }
    text += symbol;
  }
  return Ok(text);
}

/**
 * Render a grid as text, rows joined by `\n`, no trailing newline. Fails when
 * a cell has no symbol in the alphabet.
 */
export function gridToText(grid: ReadonlyCellGrid): Result<string, AutomatonError> {
  const lines: string[] = [];
  for (let row = 0; row < grid.rows; row++) {
    const line = cellsToText(grid.getRow(row));
    if (line.isErr()) {
      return Err(line.error);
    }
    lines.push(line.value);
  }
  return Ok(lines.join("\n"));
}
