/**
 * Boundary policies: how reads outside the grid are resolved.
 */

import { type Cell, CellCode } from "./cell";

export type BoundaryPolicy =
  | { readonly kind: "periodic" }
  | { readonly kind: "sentinel"; readonly symbol: Cell };

/**
 * One policy per axis. Rules hold one of these.
 */
export interface BoundaryPair {
  readonly row: BoundaryPolicy;
  readonly col: BoundaryPolicy;
}

const PERIODIC: BoundaryPolicy = { kind: "periodic" };

export const Boundary = {
  periodic(): BoundaryPolicy {
    return PERIODIC;
  },

  sentinel(symbol: Cell = CellCode.BORDER): BoundaryPolicy {
    return { kind: "sentinel", symbol };
  },

  /**
   * Same policy on both axes.
   */
  both(policy: BoundaryPolicy): BoundaryPair {
    return { row: policy, col: policy };
  },
} as const;

export const PERIODIC_BOUNDARIES: BoundaryPair = Boundary.both(PERIODIC);

/**
 * Resolve an index along one axis. Returns the in-range index, or undefined
 * when the policy is a sentinel and the index falls outside `[0, size)`.
 */
export function resolveIndex(
  index: number,
  size: number,
  policy: BoundaryPolicy,
): number | undefined {
  if (index >= 0 && index < size) return index;
  if (policy.kind === "sentinel") return undefined;
  return wrapIndex(index, size);
}

/**
 * Mathematical modulo, so negative offsets wrap to the far edge.
 */
export function wrapIndex(index: number, size: number): number {
  return ((index % size) + size) % size;
}

export function boundaryEquals(a: BoundaryPolicy, b: BoundaryPolicy): boolean {
  if (a.kind === "periodic") return b.kind === "periodic";
  return b.kind === "sentinel" && a.symbol === b.symbol;
}
