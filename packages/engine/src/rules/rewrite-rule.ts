/**
 * Rewrite rule: search-and-replace of local patterns with priority-ordered,
 * randomly tie-broken conflict resolution.
 *
 * A step runs in two phases:
 *
 * 1. Every pattern scans the grid as it was at the start of the step and
 *    produces replacement groups. Scans share no mutable state.
 * 2. All groups are shuffled, stable-sorted by descending priority and
 *    walked once. A group is applied only if none of its cells has been
 *    claimed by an earlier group.
 */

import {
  type AutomatonError,
  createSystemRandom,
  probability,
  type RandomGenerator,
  Result,
  type RewriteRuleDefinition,
  shuffle,
} from "@cellforge/contracts";
import {
  type BoundaryPair,
  type BoundaryPolicy,
  type Cell,
  CellCode,
  type MutableCellGrid,
  PERIODIC_BOUNDARIES,
  type ReadonlyCellGrid,
} from "../core/grid";
import { NO_OP_TRACE, type RewriteStats, type StepTrace } from "../trace";
import { Pattern } from "./pattern";
import type { Rule, RuleOptions } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

export interface Replacement {
  readonly row: number;
  readonly col: number;
  readonly value: Cell;
}

/**
 * Every non-wildcard `after` cell of one match, in absolute coordinates.
 */
export interface ReplacementGroup {
  readonly priority: number;
  readonly patternIndex: number;
  readonly anchorRow: number;
  readonly anchorCol: number;
  readonly cells: readonly Replacement[];
}

export interface RewriteStepReport extends RewriteStats {
  readonly approvedGroups: readonly ReplacementGroup[];
}

export interface RewriteRuleOptions extends RuleOptions {
  readonly patterns?: readonly Pattern[];
  /** Defaults to periodic on both axes. */
  readonly boundaries?: BoundaryPair;
  /** Source for chance rolls and the tie-break shuffle. */
  readonly random?: RandomGenerator;
}

/**
 * Number of anchor positions along one axis. Sentinel axes only admit
 * windows that fit entirely inside the grid; periodic axes admit every
 * position and wrap. A pattern larger than the grid has no anchors.
 */
function anchorCount(size: number, patternSize: number, policy: BoundaryPolicy): number {
  if (patternSize > size) return 0;
  return policy.kind === "periodic" ? size : size - patternSize + 1;
}

function matchesAt(
  grid: ReadonlyCellGrid,
  before: ReadonlyCellGrid,
  anchorRow: number,
  anchorCol: number,
): boolean {
  for (let dr = 0; dr < before.rows; dr++) {
    const row = (anchorRow + dr) % grid.rows;
    for (let dc = 0; dc < before.cols; dc++) {
      const expected = before.getUnsafe(dr, dc);
      if (expected === CellCode.WILDCARD) continue;
      if (grid.getUnsafe(row, (anchorCol + dc) % grid.cols) !== expected) return false;
    }
  }
  return true;
}

export class RewriteRule implements Rule {
  readonly kind = "rewrite" as const;
  readonly id: string;
  readonly boundaries: BoundaryPair;
  private readonly patternList: Pattern[] = [];
  private readonly random: RandomGenerator;
  private readonly trace: StepTrace;

  constructor(options: RewriteRuleOptions = {}) {
    this.id = options.id ?? "rewrite";
    this.boundaries = options.boundaries ?? PERIODIC_BOUNDARIES;
    this.random = options.random ?? createSystemRandom();
    this.trace = options.trace ?? NO_OP_TRACE;

    for (const pattern of options.patterns ?? []) {
      this.addPattern(pattern);
    }
  }

  /**
   * Build a rule from its structured definition, validating every pattern.
   */
  static fromDefinition(
    definition: RewriteRuleDefinition,
    options: Omit<RewriteRuleOptions, "patterns" | "boundaries"> = {},
  ): Result<RewriteRule, AutomatonError> {
    return Result.all(definition.patterns.map((p) => Pattern.fromDefinition(p))).map(
      (patterns) =>
        new RewriteRule({
          ...options,
          patterns,
          boundaries: { row: definition.rowBoundary, col: definition.colBoundary },
        }),
    );
  }

  get patterns(): readonly Pattern[] {
    return this.patternList;
  }

  /**
   * Append a pattern. Takes effect from the next step.
   */
  addPattern(pattern: Pattern): this {
    if (pattern.isInert()) {
      const message = `Pattern ${this.patternList.length} has an all-wildcard after template and will never change the grid`;
      this.trace.warning(this.id, message);
      if (DEV_MODE) {
        console.warn(`RewriteRule(${this.id}): ${message}`);
      }
    }
    this.patternList.push(pattern);
    return this;
  }

  /**
   * Phase 1: scan every pattern against the grid and collect the non-empty
   * replacement groups. Does not modify the grid.
   */
  findMatches(grid: ReadonlyCellGrid): ReplacementGroup[] {
    const perPattern = this.patternList.map((pattern, index) =>
      this.scanPattern(grid, pattern, index),
    );
    return perPattern.flat();
  }

  private scanPattern(
    grid: ReadonlyCellGrid,
    pattern: Pattern,
    patternIndex: number,
  ): ReplacementGroup[] {
    if (pattern.isInert()) return [];

    const rowAnchors = anchorCount(grid.rows, pattern.rows, this.boundaries.row);
    const colAnchors = anchorCount(grid.cols, pattern.cols, this.boundaries.col);
    const rng = () => this.random.next();
    const groups: ReplacementGroup[] = [];

    for (let anchorRow = 0; anchorRow < rowAnchors; anchorRow++) {
      for (let anchorCol = 0; anchorCol < colAnchors; anchorCol++) {
        // Chance is rolled before the template comparison
        if (!probability(rng, pattern.chance)) continue;
        if (!matchesAt(grid, pattern.before, anchorRow, anchorCol)) continue;

        const cells: Replacement[] = [];
        for (let dr = 0; dr < pattern.rows; dr++) {
          for (let dc = 0; dc < pattern.cols; dc++) {
            const value = pattern.after.getUnsafe(dr, dc);
            if (value === CellCode.WILDCARD) continue;
            cells.push({
              row: (anchorRow + dr) % grid.rows,
              col: (anchorCol + dc) % grid.cols,
              value,
            });
          }
        }

        groups.push({ priority: pattern.priority, patternIndex, anchorRow, anchorCol, cells });
      }
    }

    return groups;
  }

  /**
   * Phase 2: shuffle, stable-sort by descending priority, then approve each
   * group whose cells are all still unclaimed and write it into the grid.
   */
  resolveConflicts(
    grid: MutableCellGrid,
    groups: readonly ReplacementGroup[],
  ): RewriteStepReport {
    const ordered = shuffle(() => this.random.next(), groups).sort(
      (a, b) => b.priority - a.priority,
    );

    const claimed = new Uint8Array(grid.rows * grid.cols);
    const approvedGroups: ReplacementGroup[] = [];
    let cellsWritten = 0;

    for (const group of ordered) {
      const free = group.cells.every((cell) => claimed[cell.row * grid.cols + cell.col] === 0);
      if (!free) continue;

      for (const cell of group.cells) {
        claimed[cell.row * grid.cols + cell.col] = 1;
        grid.setUnsafe(cell.row, cell.col, cell.value);
      }
      cellsWritten += group.cells.length;
      approvedGroups.push(group);
    }

    return {
      candidates: groups.length,
      approved: approvedGroups.length,
      rejected: groups.length - approvedGroups.length,
      cellsWritten,
      approvedGroups,
    };
  }

  /**
   * Run one step and report what was applied.
   */
  apply(grid: MutableCellGrid): RewriteStepReport {
    const started = performance.now();
    this.trace.start(this.id);

    const report = this.resolveConflicts(grid, this.findMatches(grid));

    this.trace.rewrite(this.id, {
      candidates: report.candidates,
      approved: report.approved,
      rejected: report.rejected,
      cellsWritten: report.cellsWritten,
    });
    this.trace.end(this.id, performance.now() - started);
    return report;
  }

  transform(grid: MutableCellGrid): void {
    this.apply(grid);
  }

  toDefinition(): RewriteRuleDefinition {
    return {
      rowBoundary: this.boundaries.row,
      colBoundary: this.boundaries.col,
      patterns: this.patternList.map((pattern) => pattern.toDefinition()),
    };
  }
}
