/**
 * Stencil rule: each cell's next value is a pure function of a fixed window
 * around it in the previous generation.
 */

import { AutomatonError, Err, Ok, type Result } from "@cellforge/contracts";
import {
  type BoundaryPair,
  type Cell,
  Grid,
  isCellValue,
  type MutableCellGrid,
  PERIODIC_BOUNDARIES,
  type ReadonlyCellGrid,
} from "../core/grid";
import { NO_OP_TRACE, type StepTrace } from "../trace";
import type { Rule, RuleOptions } from "./types";

/**
 * How far the window reaches from the target cell in each direction.
 *
 * ```text
 *  +---------------+
 *  |      up       |
 *  |--left-C-right-|
 *  |     down      |
 *  +---------------+
 * ```
 */
export interface StencilExtents {
  readonly up: number;
  readonly right: number;
  readonly down: number;
  readonly left: number;
}

/**
 * The neighbourhood handed to a stencil transform:
 * `(up + down + 1) x (left + right + 1)` cells, target at `(up, left)`.
 *
 * The same window object is refilled for every cell; transforms must not
 * keep a reference to it.
 */
export interface StencilWindow extends ReadonlyCellGrid {
  readonly centerRow: number;
  readonly centerCol: number;
  center(): Cell;
}

export type StencilTransform = (window: StencilWindow) => Cell;

export interface StencilRuleOptions extends RuleOptions {
  /** Extents per direction, or one number for a square window. */
  readonly extents: StencilExtents | number;
  /** Defaults to periodic on both axes. */
  readonly boundaries?: BoundaryPair;
  readonly transform: StencilTransform;
}

class WindowGrid extends Grid implements StencilWindow {
  constructor(
    rows: number,
    cols: number,
    readonly centerRow: number,
    readonly centerCol: number,
  ) {
    super(rows, cols);
  }

  center(): Cell {
    return this.getUnsafe(this.centerRow, this.centerCol);
  }
}

function normalizeExtents(extents: StencilExtents | number): StencilExtents {
  if (typeof extents === "number") {
    return { up: extents, right: extents, down: extents, left: extents };
  }
  return { up: extents.up, right: extents.right, down: extents.down, left: extents.left };
}

export class StencilRule implements Rule {
  readonly kind = "stencil" as const;
  readonly id: string;
  readonly extents: StencilExtents;
  readonly boundaries: BoundaryPair;
  private readonly cellTransform: StencilTransform;
  private readonly trace: StepTrace;

  private constructor(
    extents: StencilExtents,
    boundaries: BoundaryPair,
    cellTransform: StencilTransform,
    id: string,
    trace: StepTrace,
  ) {
    this.extents = extents;
    this.boundaries = boundaries;
    this.cellTransform = cellTransform;
    this.id = id;
    this.trace = trace;
  }

  /**
   * Validate the extents and build the rule.
   */
  static create(options: StencilRuleOptions): Result<StencilRule, AutomatonError> {
    const extents = normalizeExtents(options.extents);
    for (const [direction, value] of Object.entries(extents)) {
      if (!Number.isInteger(value) || value < 0) {
        return Err(
          new AutomatonError(
            "STENCIL_EXTENTS_INVALID",
            `Stencil extent "${direction}" must be a non-negative integer, got ${value}`,
            { direction, value },
          ),
        );
      }
    }

    return Ok(
      new StencilRule(
        extents,
        options.boundaries ?? PERIODIC_BOUNDARIES,
        options.transform,
        options.id ?? "stencil",
        options.trace ?? NO_OP_TRACE,
      ),
    );
  }

  get windowRows(): number {
    return this.extents.up + this.extents.down + 1;
  }

  get windowCols(): number {
    return this.extents.left + this.extents.right + 1;
  }

  /**
   * Check that the window fits inside a grid of the given size.
   */
  validateFor(rows: number, cols: number): Result<void, AutomatonError> {
    if (this.windowRows > rows || this.windowCols > cols) {
      return Err(
        new AutomatonError(
          "WINDOW_EXCEEDS_GRID",
          `Stencil window ${this.windowRows}x${this.windowCols} does not fit a ${rows}x${cols} grid`,
          { windowRows: this.windowRows, windowCols: this.windowCols, rows, cols },
        ),
      );
    }
    return Ok(undefined);
  }

  /**
   * Compute the next generation into separate storage, then copy it over
   * the grid. No transform call ever sees a partially updated generation.
   */
  transform(grid: MutableCellGrid): void {
    const started = performance.now();
    this.trace.start(this.id);

    const { up, left } = this.extents;
    const windowRows = this.windowRows;
    const windowCols = this.windowCols;
    const window = new WindowGrid(windowRows, windowCols, up, left);
    const next = new Grid(grid.rows, grid.cols);

    for (let row = 0; row < grid.rows; row++) {
      for (let col = 0; col < grid.cols; col++) {
        for (let dr = 0; dr < windowRows; dr++) {
          const sourceRow = row + dr - up;
          for (let dc = 0; dc < windowCols; dc++) {
            window.setUnsafe(
              dr,
              dc,
              grid.getWithBoundary(sourceRow, col + dc - left, this.boundaries),
            );
          }
        }

        const value = this.cellTransform(window);
        if (!isCellValue(value)) {
          throw AutomatonError.cellValueInvalid(value, { row, col, rule: this.id });
        }
        next.setUnsafe(row, col, value);
      }
    }

    grid.copyFrom(next);

    this.trace.stencil(this.id, grid.rows * grid.cols);
    this.trace.end(this.id, performance.now() - started);
  }
}
