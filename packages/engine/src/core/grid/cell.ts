/**
 * Cell alphabet.
 *
 * Cells are 8-bit unsigned integers. Codes 0-61 have printable symbols for
 * hand-written grids and rule files, plus two reserved codes.
 */

export type Cell = number;

export const CellCode = {
  /** Empty cell, written as a space. */
  EMPTY: 0,
  /** Default out-of-bounds marker for sentinel boundaries. */
  BORDER: 126,
  /** Matches anything in a `before` template, leaves the cell alone in an `after` template. */
  WILDCARD: 127,
} as const;

export const MAX_CELL_VALUE = 255;

const LOWER_OFFSET = 10; // 'a'..'z' -> 10..35
const UPPER_OFFSET = 36; // 'A'..'Z' -> 36..61

export function isCellValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CELL_VALUE;
}

/**
 * Map a text symbol to its cell code. `'0'` is accepted as an alias for the
 * empty cell. Returns undefined for symbols outside the alphabet.
 */
export function symbolToCell(symbol: string): Cell | undefined {
  if (symbol.length !== 1) return undefined;
  const code = symbol.charCodeAt(0);

  if (symbol === " " || symbol === "0") return CellCode.EMPTY;
  if (symbol === "_") return CellCode.BORDER;
  if (symbol === "*") return CellCode.WILDCARD;
  if (code >= 49 && code <= 57) return code - 48;
  if (code >= 97 && code <= 122) return code - 97 + LOWER_OFFSET;
  if (code >= 65 && code <= 90) return code - 65 + UPPER_OFFSET;
  return undefined;
}

/**
 * Map a cell code to its text symbol, or undefined when the code has none.
 */
export function cellToSymbol(cell: Cell): string | undefined {
  if (cell === CellCode.EMPTY) return " ";
  if (cell === CellCode.BORDER) return "_";
  if (cell === CellCode.WILDCARD) return "*";
  if (cell >= 1 && cell <= 9) return String.fromCharCode(48 + cell);
  if (cell >= LOWER_OFFSET && cell < UPPER_OFFSET) {
    return String.fromCharCode(97 + cell - LOWER_OFFSET);
  }
  if (cell >= UPPER_OFFSET && cell < UPPER_OFFSET + 26) {
    return String.fromCharCode(65 + cell - UPPER_OFFSET);
  }
  return undefined;
}
