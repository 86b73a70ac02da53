/**
 * Fluent construction of an Automaton.
 *
 * @example
 * ```typescript
 * const automaton = new AutomatonBuilder()
 *   .fromText("X\n \n ")
 *   .withPatternBoundaries(Boundary.sentinel())
 *   .withPattern({ before: [[59], [0]], after: [[0], [59]] })
 *   .withColor("X", [224, 210, 159, 255])
 *   .withSeed(42)
 *   .build()
 *   .getOrThrow();
 * ```
 */

import {
  type AutomatonConfigInput,
  AutomatonError,
  Err,
  Ok,
  type RandomGenerator,
  type Result,
  SeededRandom,
} from "@cellforge/contracts";
import {
  type BoundaryPair,
  type BoundaryPolicy,
  type Cell,
  Grid,
  PERIODIC_BOUNDARIES,
  symbolToCell,
} from "../core/grid";
import { gridFromText } from "../io/text-grid";
import { CompositeRule, Pattern, type PatternInit, RewriteRule, type Rule, StencilRule } from "../rules";
import { createStepTrace, type StepTrace } from "../trace";
import { Automaton, type Clock, type Rgba, type StepMode } from "./automaton";
import { resolveAutomatonConfig, type ValidatedAutomatonConfig } from "./config";

const DEFAULT_ROWS = 10;
const DEFAULT_COLS = 10;

/**
 * Cell code or its text symbol.
 */
export type CellKey = Cell | string;

/**
 * Check every stencil window in a rule tree against the grid size.
 */
function validateRuleFor(rule: Rule, rows: number, cols: number): Result<void, AutomatonError> {
  if (rule instanceof StencilRule) {
    return rule.validateFor(rows, cols);
  }
  if (rule instanceof CompositeRule) {
    for (const inner of rule.rules) {
      const result = validateRuleFor(inner, rows, cols);
      if (result.isErr()) return result;
    }
  }
  return Ok(undefined);
}

function stepModeFor(config: ValidatedAutomatonConfig): StepMode {
  return config.stepMode === "limited"
    ? { kind: "limited", minIntervalMs: config.minIntervalMs }
    : { kind: "immediate" };
}

export class AutomatonBuilder {
  private source: Result<Grid, AutomatonError> | undefined;
  private readonly rules: Rule[] = [];
  private readonly patterns: Pattern[] = [];
  private patternBoundaries: BoundaryPair = PERIODIC_BOUNDARIES;
  private readonly colors = new Map<Cell, Rgba>();
  private config: AutomatonConfigInput = {};
  private random: RandomGenerator | undefined;
  private trace: StepTrace | undefined;
  private clock: Clock | undefined;
  // First error wins; build() reports it.
  private readonly errors: AutomatonError[] = [];

  // ==========================================================================
  // Initial state
  // ==========================================================================

  fromRows(rows: readonly (readonly Cell[])[]): this {
    this.source = Grid.fromRows(rows);
    return this;
  }

  /**
   * Row-major cells split into rows of `cols`.
   */
  fromCells(cells: readonly Cell[], cols: number): this {
    this.source = Grid.fromCells(cells, cols);
    return this;
  }

  fromText(text: string): this {
    this.source = gridFromText(text);
    return this;
  }

  /**
   * Start from a copy of an existing grid.
   */
  fromGrid(grid: Grid): this {
    this.source = Ok(grid);
    return this;
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  /**
   * Add a pattern to the builder's rewrite rule. Patterns from all calls form
   * one rule, applied after every rule added with `withRule`.
   */
  withPattern(pattern: Pattern | PatternInit): this {
    if (pattern instanceof Pattern) {
      this.patterns.push(pattern);
      return this;
    }
    Pattern.create(pattern).match(
      (created) => {
        this.patterns.push(created);
      },
      (error) => {
        this.errors.push(error);
      },
    );
    return this;
  }

  withPatterns(patterns: Iterable<Pattern | PatternInit>): this {
    for (const pattern of patterns) {
      this.withPattern(pattern);
    }
    return this;
  }

  /**
   * Boundary policies for the builder's rewrite rule. With one argument both
   * axes use it.
   */
  withPatternBoundaries(row: BoundaryPolicy, col: BoundaryPolicy = row): this {
    this.patternBoundaries = { row, col };
    return this;
  }

  withRule(rule: Rule): this {
    this.rules.push(rule);
    return this;
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  withColor(cell: CellKey, color: Rgba): this {
    const code = typeof cell === "string" ? symbolToCell(cell) : cell;
    if (code === undefined) {
      this.errors.push(
        new AutomatonError("SYMBOL_UNKNOWN", `Unknown symbol "${String(cell)}" in colour table`, {
          symbol: cell,
        }),
      );
      return this;
    }
    this.colors.set(code, color);
    return this;
  }

  withColors(colors: Iterable<readonly [CellKey, Rgba]>): this {
    for (const [cell, color] of colors) {
      this.withColor(cell, color);
    }
    return this;
  }

  // ==========================================================================
  // Pacing, randomness and tracing
  // ==========================================================================

  /**
   * Switch to limited stepping: at most one step per `intervalMs`.
   */
  withMinTimeStep(intervalMs: number): this {
    this.config = { ...this.config, stepMode: "limited", minIntervalMs: intervalMs };
    return this;
  }

  withSeed(seed: number): this {
    this.config = { ...this.config, seed };
    return this;
  }

  /**
   * Use this source for the pattern rule instead of one seeded from the
   * config.
   */
  withRandom(random: RandomGenerator): this {
    this.random = random;
    return this;
  }

  /**
   * Pass `true` to record events with a fresh collector, or a collector to
   * record into.
   */
  withTrace(trace: StepTrace | boolean = true): this {
    if (typeof trace === "boolean") {
      this.config = { ...this.config, trace };
      this.trace = undefined;
    } else {
      this.trace = trace;
    }
    return this;
  }

  withClock(clock: Clock): this {
    this.clock = clock;
    return this;
  }

  /**
   * Merge a config object over the current settings.
   */
  withConfig(config: AutomatonConfigInput): this {
    this.config = { ...this.config, ...config };
    return this;
  }

  // ==========================================================================
  // Build
  // ==========================================================================

  build(): Result<Automaton, AutomatonError> {
    const firstError = this.errors[0];
    if (firstError !== undefined) {
      return Err(firstError);
    }

    const configResult = resolveAutomatonConfig(this.config);
    if (configResult.isErr()) return Err(configResult.error);
    const config = configResult.value;

    const gridResult = this.source ?? Ok(new Grid(DEFAULT_ROWS, DEFAULT_COLS));
    if (gridResult.isErr()) return Err(gridResult.error);
    // The builder may be built again; never share the source grid.
    const grid = gridResult.value.clone();

    const trace = this.trace ?? createStepTrace(config.trace);
    const rules = [...this.rules];
    if (this.patterns.length > 0) {
      rules.push(
        new RewriteRule({
          id: "patterns",
          patterns: this.patterns,
          boundaries: this.patternBoundaries,
          random: this.random ?? new SeededRandom(config.seed),
          trace,
        }),
      );
    }

    const rule = rules.length === 1 ? rules[0] : new CompositeRule(rules);
    const valid = validateRuleFor(rule, grid.rows, grid.cols);
    if (valid.isErr()) return Err(valid.error);

    return Ok(
      new Automaton({
        state: grid,
        rule,
        stepMode: stepModeFor(config),
        colors: this.colors,
        clock: this.clock,
        trace,
      }),
    );
  }
}
