/**
 * Cell grid backed by flat Uint8Array storage, row-major.
 */

import { AutomatonError, Err, Ok, type Result } from "@cellforge/contracts";
import { type BoundaryPair, wrapIndex } from "./boundary";
import { type Cell, CellCode, isCellValue } from "./cell";
import type { MutableCellGrid, ReadonlyCellGrid } from "./types";

/**
 * Rectangular grid of cells addressed by `(row, col)`.
 *
 * Dimensions are fixed at construction. Rules mutate the cells in place;
 * no concurrency control is built in, callers serialize writes.
 */
export class Grid implements MutableCellGrid {
  readonly rows: number;
  readonly cols: number;
  private readonly data: Uint8Array;

  constructor(rows: number, cols: number, fillValue: Cell = CellCode.EMPTY) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new AutomatonError(
        "GRID_DIMENSIONS_INVALID",
        `Invalid grid dimensions: ${rows}x${cols}`,
        { rows, cols },
      );
    }
    if (!isCellValue(fillValue)) {
      throw AutomatonError.cellValueInvalid(fillValue);
    }

    this.rows = rows;
    this.cols = cols;
    this.data = new Uint8Array(rows * cols);

    if (fillValue !== CellCode.EMPTY) {
      this.data.fill(fillValue);
    }
  }

  /**
   * Create a grid from nested rows. Rejects empty, ragged or out-of-range input.
   */
  static fromRows(rows: readonly (readonly number[])[]): Result<Grid, AutomatonError> {
    const first = rows[0];
    if (first === undefined || first.length === 0) {
      return Err(
        new AutomatonError("GRID_DIMENSIONS_INVALID", "Grid needs at least one row and one column", {
          rows: rows.length,
          cols: first?.length ?? 0,
        }),
      );
    }

    const grid = new Grid(rows.length, first.length);
    for (let r = 0; r < rows.length; r++) {
      const row = rows[r];
      if (row.length !== first.length) {
        return Err(
          new AutomatonError(
            "GRID_RAGGED",
            `Row ${r} has ${row.length} cells, expected ${first.length}`,
            { row: r, length: row.length, expected: first.length },
          ),
        );
      }
      for (let c = 0; c < row.length; c++) {
        const value = row[c];
        if (!isCellValue(value)) {
          return Err(AutomatonError.cellValueInvalid(value, { row: r, col: c }));
        }
        grid.data[r * grid.cols + c] = value;
      }
    }
    return Ok(grid);
  }

  /**
   * Create a grid from a flat row-major vector and a column count.
   */
  static fromCells(cells: readonly number[], cols: number): Result<Grid, AutomatonError> {
    if (!Number.isInteger(cols) || cols <= 0 || cells.length === 0 || cells.length % cols !== 0) {
      return Err(
        new AutomatonError(
          "GRID_DIMENSIONS_INVALID",
          `Cannot lay out ${cells.length} cells in rows of ${cols}`,
          { cells: cells.length, cols },
        ),
      );
    }
    const grid = new Grid(cells.length / cols, cols);
    for (let i = 0; i < cells.length; i++) {
      const value = cells[i];
      if (!isCellValue(value)) {
        return Err(AutomatonError.cellValueInvalid(value, { index: i }));
      }
      grid.data[i] = value;
    }
    return Ok(grid);
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(row: number, col: number): Cell | undefined {
    if (!this.isInBounds(row, col)) return undefined;
    return this.data[row * this.cols + col];
  }

  /**
   * Set a cell. Throws CELL_OUT_OF_BOUNDS with the offending coordinate and
   * the grid's dimensions, or CELL_VALUE_INVALID.
   */
  set(row: number, col: number, value: Cell): void {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !this.isInBounds(row, col)) {
      throw AutomatonError.outOfBounds(row, col, this.rows, this.cols);
    }
    if (!isCellValue(value)) {
      throw AutomatonError.cellValueInvalid(value, { row, col });
    }
    this.data[row * this.cols + col] = value;
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(row: number, col: number): Cell {
    return this.data[row * this.cols + col];
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(row: number, col: number, value: Cell): void {
    this.data[row * this.cols + col] = value;
  }

  /**
   * Read through a boundary pair. The row policy is consulted first; a
   * sentinel on either axis short-circuits to its symbol.
   */
  getWithBoundary(row: number, col: number, boundaries: BoundaryPair): Cell {
    let r = row;
    if (r < 0 || r >= this.rows) {
      if (boundaries.row.kind === "sentinel") return boundaries.row.symbol;
      r = wrapIndex(r, this.rows);
    }

    let c = col;
    if (c < 0 || c >= this.cols) {
      if (boundaries.col.kind === "sentinel") return boundaries.col.symbol;
      c = wrapIndex(c, this.cols);
    }

    return this.data[r * this.cols + c];
  }

  // ===========================================================================
  // BULK OPERATIONS
  // ===========================================================================

  fill(value: Cell): void {
    if (!isCellValue(value)) {
      throw AutomatonError.cellValueInvalid(value);
    }
    this.data.fill(value);
  }

  /**
   * Replace every cell with the other grid's contents. Dimensions must match.
   */
  copyFrom(other: ReadonlyCellGrid): void {
    if (other.rows !== this.rows || other.cols !== this.cols) {
      throw new AutomatonError(
        "GRID_DIMENSIONS_INVALID",
        `Cannot copy a ${other.rows}x${other.cols} grid into a ${this.rows}x${this.cols} grid`,
        { rows: other.rows, cols: other.cols, expectedRows: this.rows, expectedCols: this.cols },
      );
    }
    this.data.set(other.getRawDataCopy());
  }

  clone(): Grid {
    const copy = new Grid(this.rows, this.cols);
    copy.data.set(this.data);
    return copy;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getRow(row: number): Cell[] {
    if (row < 0 || row >= this.rows) return [];
    return Array.from(this.data.subarray(row * this.cols, (row + 1) * this.cols));
  }

  toRows(): Cell[][] {
    const result: Cell[][] = [];
    for (let r = 0; r < this.rows; r++) {
      result.push(this.getRow(r));
    }
    return result;
  }

  forEach(callback: (row: number, col: number, value: Cell) => void): void {
    for (let r = 0; r < this.rows; r++) {
      const offset = r * this.cols;
      for (let c = 0; c < this.cols; c++) {
        callback(r, c, this.data[offset + c]);
      }
    }
  }

  countCells(value: Cell): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === value) count++;
    }
    return count;
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  equals(other: ReadonlyCellGrid): boolean {
    if (other.rows !== this.rows || other.cols !== this.cols) return false;
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (other.getUnsafe(r, c) !== this.data[r * this.cols + c]) return false;
      }
    }
    return true;
  }
}
