/**
 * Automaton driver: a grid, the rule that advances it, step pacing and a
 * colour table for rendering.
 */

import { AutomatonError, Err, Ok, type Result } from "@cellforge/contracts";
import { type Cell, type Grid, isCellValue, type ReadonlyCellGrid } from "../core/grid";
import { gridChecksum } from "../core/hash";
import { gridToText } from "../io/text-grid";
import type { Rule } from "../rules";
import { NO_OP_TRACE, type StepTrace } from "../trace";

export type Rgba = readonly [red: number, green: number, blue: number, alpha: number];

export type StepMode =
  | { readonly kind: "immediate" }
  | { readonly kind: "limited"; readonly minIntervalMs: number };

/** Milliseconds from an arbitrary origin. */
export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

const TRANSPARENT: Rgba = [0, 0, 0, 0];

export interface AutomatonOptions {
  /** Owned by the automaton from now on. */
  readonly state: Grid;
  readonly rule: Rule;
  readonly stepMode?: StepMode;
  readonly colors?: ReadonlyMap<Cell, Rgba>;
  readonly clock?: Clock;
  readonly trace?: StepTrace;
}

export class Automaton {
  readonly rule: Rule;
  readonly stepMode: StepMode;
  readonly trace: StepTrace;
  private readonly grid: Grid;
  private readonly colors: Map<Cell, Rgba>;
  private readonly clock: Clock;
  private lastStep: number | undefined;
  private generationCount = 0;

  constructor(options: AutomatonOptions) {
    this.grid = options.state;
    this.rule = options.rule;
    this.stepMode = options.stepMode ?? { kind: "immediate" };
    this.colors = new Map(options.colors ?? []);
    this.clock = options.clock ?? systemClock;
    this.trace = options.trace ?? NO_OP_TRACE;
  }

  /**
   * Read-only view of the current generation.
   */
  get state(): ReadonlyCellGrid {
    return this.grid;
  }

  get dimensions(): { readonly rows: number; readonly cols: number } {
    return { rows: this.grid.rows, cols: this.grid.cols };
  }

  /** Number of steps performed so far. */
  get generation(): number {
    return this.generationCount;
  }

  /**
   * Advance by one generation if the step mode allows it.
   *
   * Immediate mode always steps. Limited mode steps only when at least
   * `minIntervalMs` has passed since the last step; the first call starts
   * the clock and steps only when the interval is zero.
   *
   * @returns whether a step was performed
   */
  nextStep(): boolean {
    const now = this.clock();
    if (this.lastStep === undefined) {
      this.lastStep = now;
    }

    if (this.stepMode.kind === "limited" && now - this.lastStep < this.stepMode.minIntervalMs) {
      return false;
    }

    this.rule.transform(this.grid);
    this.generationCount++;
    this.lastStep = now;
    return true;
  }

  /**
   * Run `count` steps, ignoring the step mode.
   */
  advance(count: number): this {
    for (let i = 0; i < count; i++) {
      this.rule.transform(this.grid);
      this.generationCount++;
    }
    return this;
  }

  /**
   * Overwrite one cell between steps.
   *
   * @returns true when the stored value changed
   */
  setCell(row: number, col: number, value: Cell): Result<boolean, AutomatonError> {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !this.grid.isInBounds(row, col)) {
      return Err(AutomatonError.outOfBounds(row, col, this.grid.rows, this.grid.cols));
    }
    if (!isCellValue(value)) {
      return Err(AutomatonError.cellValueInvalid(value, { row, col }));
    }

    const changed = this.grid.getUnsafe(row, col) !== value;
    this.grid.setUnsafe(row, col, value);
    this.trace.cellSet("automaton", { row, col, value, changed });
    return Ok(changed);
  }

  getColor(cell: Cell): Rgba | undefined {
    return this.colors.get(cell);
  }

  setColor(cell: Cell, color: Rgba): this {
    this.colors.set(cell, color);
    return this;
  }

  /**
   * Render the grid as RGBA bytes, row-major, four bytes per cell. Cells
   * without a colour are transparent black.
   */
  toRgba(): Uint8Array {
    const pixels = new Uint8Array(this.grid.rows * this.grid.cols * 4);
    this.grid.forEach((row, col, value) => {
      const color = this.colors.get(value) ?? TRANSPARENT;
      pixels.set(color, (row * this.grid.cols + col) * 4);
    });
    return pixels;
  }

  toText(): Result<string, AutomatonError> {
    return gridToText(this.grid);
  }

  checksum(): string {
    return gridChecksum(this.grid);
  }
}
