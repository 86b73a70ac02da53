import { type BoundaryPair, type Cell, PERIODIC_BOUNDARIES } from "../core/grid";
import { type RuleOptions, StencilRule } from "../rules";

export interface GameOfLifeOptions extends RuleOptions {
  /** Default 1. */
  readonly alive?: Cell;
  /** Default 0. */
  readonly dead?: Cell;
  /** Default periodic (a torus). */
  readonly boundaries?: BoundaryPair;
}

/**
 * Conway's Game of Life (B3/S23) over the 8-cell Moore neighbourhood.
 * Out-of-bounds cells under a sentinel policy count as alive only if the
 * sentinel equals `alive`.
 */
export function gameOfLife(options: GameOfLifeOptions = {}): StencilRule {
  const alive = options.alive ?? 1;
  const dead = options.dead ?? 0;

  return StencilRule.create({
    id: options.id ?? "game-of-life",
    trace: options.trace,
    extents: 1,
    boundaries: options.boundaries ?? PERIODIC_BOUNDARIES,
    transform: (window) => {
      const center = window.center();
      const neighbours = window.countCells(alive) - (center === alive ? 1 : 0);
      if (neighbours === 3) return alive;
      if (neighbours === 2 && center === alive) return alive;
      return dead;
    },
  }).getOrThrow();
}
