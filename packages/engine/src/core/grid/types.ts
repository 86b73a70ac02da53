/**
 * Grid interfaces.
 */

import type { BoundaryPair } from "./boundary";
import type { Cell } from "./cell";

/**
 * Read-only grid interface.
 *
 * Stencil transforms and pattern matching only ever see this type, so they
 * cannot write into the generation they are reading.
 */
export interface ReadonlyCellGrid {
  readonly rows: number;
  readonly cols: number;

  isInBounds(row: number, col: number): boolean;

  /** Cell value, or undefined outside the grid. Never throws. */
  get(row: number, col: number): Cell | undefined;
  getUnsafe(row: number, col: number): Cell;
  getWithBoundary(row: number, col: number, boundaries: BoundaryPair): Cell;

  getRow(row: number): Cell[];
  toRows(): Cell[][];
  forEach(callback: (row: number, col: number, value: Cell) => void): void;
  countCells(value: Cell): number;
  getRawDataCopy(): Uint8Array;
  equals(other: ReadonlyCellGrid): boolean;
}

/**
 * Mutable grid interface. Rules transform grids of this type in place.
 */
export interface MutableCellGrid extends ReadonlyCellGrid {
  set(row: number, col: number, value: Cell): void;
  setUnsafe(row: number, col: number, value: Cell): void;
  fill(value: Cell): void;
  copyFrom(other: ReadonlyCellGrid): void;
}
