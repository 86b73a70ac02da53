import { Boundary, type Cell, CellCode } from "../core/grid";
import { type RuleOptions, StencilRule } from "../rules";

export interface Rule90Options extends RuleOptions {
  /** Default 1. */
  readonly on?: Cell;
  /** Default 0. */
  readonly off?: Cell;
}

/**
 * Wolfram's rule 90 unrolled over time: each row is one generation of the
 * one-dimensional automaton. The top row keeps its value; every other cell
 * becomes the XOR of the two diagonal neighbours in the row above. Both
 * axes use the border sentinel, so cells past the left and right edges are
 * off.
 */
export function rule90(options: Rule90Options = {}): StencilRule {
  const on = options.on ?? 1;
  const off = options.off ?? 0;

  return StencilRule.create({
    id: options.id ?? "rule90",
    trace: options.trace,
    extents: { up: 1, right: 1, down: 0, left: 1 },
    boundaries: Boundary.both(Boundary.sentinel(CellCode.BORDER)),
    transform: (window) => {
      if (window.getUnsafe(0, 1) === CellCode.BORDER) {
        return window.center();
      }
      return (window.getUnsafe(0, 0) === on) !== (window.getUnsafe(0, 2) === on) ? on : off;
    },
  }).getOrThrow();
}
