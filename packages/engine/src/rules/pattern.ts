/**
 * Pattern: a local before/after rewrite with an application chance and a
 * priority.
 */

import {
  AutomatonError,
  Err,
  Ok,
  type PatternDefinition,
  type Result,
} from "@cellforge/contracts";
import { type Cell, CellCode, Grid, type ReadonlyCellGrid } from "../core/grid";

export interface PatternInit {
  readonly before: readonly (readonly Cell[])[];
  readonly after: readonly (readonly Cell[])[];
  /** Probability in [0, 1] that a found match is kept. Default 1. */
  readonly chance?: number;
  /** Higher priorities win conflicts. Default 0. */
  readonly priority?: number;
}

export class Pattern {
  readonly before: ReadonlyCellGrid;
  readonly after: ReadonlyCellGrid;
  readonly chance: number;
  readonly priority: number;

  private constructor(
    before: ReadonlyCellGrid,
    after: ReadonlyCellGrid,
    chance: number,
    priority: number,
  ) {
    this.before = before;
    this.after = after;
    this.chance = chance;
    this.priority = priority;
  }

  /**
   * Validate the templates and numbers. `before` and `after` must have
   * identical dimensions.
   */
  static create(init: PatternInit): Result<Pattern, AutomatonError> {
    const chance = init.chance ?? 1;
    const priority = init.priority ?? 0;

    if (!Number.isFinite(chance) || chance < 0 || chance > 1) {
      return Err(
        new AutomatonError("PATTERN_INVALID", `Pattern chance must be within [0, 1], got ${chance}`, {
          chance,
        }),
      );
    }
    if (!Number.isFinite(priority)) {
      return Err(
        new AutomatonError("PATTERN_INVALID", `Pattern priority must be finite, got ${priority}`, {
          priority,
        }),
      );
    }

    const toTemplate = (side: "before" | "after") =>
      Grid.fromRows(init[side]).mapErr(
        (cause) =>
          new AutomatonError("PATTERN_INVALID", `Pattern ${side} template is invalid: ${cause.message}`, {
            side,
            cause: cause.toJSON(),
          }),
      );

    return toTemplate("before").flatMap((before) =>
      toTemplate("after").flatMap((after) => {
        if (before.rows !== after.rows || before.cols !== after.cols) {
          return Err(
            new AutomatonError(
              "PATTERN_SHAPE_MISMATCH",
              `Pattern before (${before.rows}x${before.cols}) and after (${after.rows}x${after.cols}) must have the same dimensions`,
              {
                before: { rows: before.rows, cols: before.cols },
                after: { rows: after.rows, cols: after.cols },
              },
            ),
          );
        }
        return Ok(new Pattern(before, after, chance, priority));
      }),
    );
  }

  static fromDefinition(definition: PatternDefinition): Result<Pattern, AutomatonError> {
    return Pattern.create(definition);
  }

  get rows(): number {
    return this.before.rows;
  }

  get cols(): number {
    return this.before.cols;
  }

  /**
   * True when every `after` cell is a wildcard: the pattern can match but
   * never changes anything.
   */
  isInert(): boolean {
    return this.after.countCells(CellCode.WILDCARD) === this.rows * this.cols;
  }

  toDefinition(): PatternDefinition {
    return {
      chance: this.chance,
      priority: this.priority,
      before: this.before.toRows(),
      after: this.after.toRows(),
    };
  }

  /**
   * Field-wise equality, numbers compared within `tolerance`.
   */
  equals(other: Pattern, tolerance: number = 0): boolean {
    return (
      Math.abs(this.chance - other.chance) <= tolerance &&
      Math.abs(this.priority - other.priority) <= tolerance &&
      this.before.equals(other.before) &&
      this.after.equals(other.after)
    );
  }
}
