/**
 * Rule contract shared by every rule kind.
 */

import type { MutableCellGrid } from "../core/grid";
import type { StepTrace } from "../trace";

/**
 * A transformation from one generation to the next.
 *
 * `transform` replaces the grid's contents with the next generation in
 * place. Implement this to plug custom rules into an automaton; the built-in
 * kinds also carry a `kind` discriminant (see `BuiltInRule`).
 */
export interface Rule {
  transform(grid: MutableCellGrid): void;
}

export type RuleKind = "stencil" | "rewrite" | "composite";

/**
 * Options shared by the built-in rule constructors.
 */
export interface RuleOptions {
  /** Label used in trace events. */
  readonly id?: string;
  readonly trace?: StepTrace;
}
