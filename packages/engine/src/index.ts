/**
 * @cellforge/engine - grid-based cellular automata.
 *
 * Stencil rules compute each cell from a window around it. Rewrite rules
 * search for before/after patterns and resolve overlapping matches by
 * priority with a random tie-break. Composite rules chain both.
 *
 * @example
 * ```typescript
 * import { AutomatonBuilder, gameOfLife } from "@cellforge/engine";
 *
 * const automaton = new AutomatonBuilder()
 *   .fromRows([
 *     [0, 0, 0],
 *     [1, 1, 1],
 *     [0, 0, 0],
 *   ])
 *   .withRule(gameOfLife())
 *   .build()
 *   .getOrThrow();
 *
 * automaton.nextStep();
 * ```
 */

// ============================================================================
// Core
// ============================================================================

export * from "./core";

// ============================================================================
// Rules
// ============================================================================

export * from "./rules";
export * from "./presets";

// ============================================================================
// Automaton
// ============================================================================

export * from "./automaton";

// ============================================================================
// Serialization
// ============================================================================

export * from "./io";
export * from "./serialization";

// ============================================================================
// Tracing & testing
// ============================================================================

export * from "./trace";
export {
  assertDeterministic,
  type DeterminismReport,
  DeterminismViolationError,
  testDeterminism,
} from "./testing";
