/**
 * Determinism checks for seeded automata.
 */

import type { Automaton } from "./automaton";

/**
 * Thrown when identically built automata diverge.
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly steps: number,
  ) {
    super(
      `Non-deterministic run detected: ${checksums.length} different checksums after ${steps} steps`,
    );
    this.name = "DeterminismViolationError";
  }
}

export interface DeterminismReport {
  readonly deterministic: boolean;
  readonly checksums: string[];
  readonly uniqueChecksums: string[];
}

/**
 * Build `runs` automata with `create`, advance each by `steps` and compare
 * the final grid checksums. `create` must inject the same seed every time.
 */
export function testDeterminism(
  create: () => Automaton,
  steps: number,
  runs: number = 3,
): DeterminismReport {
  const checksums: string[] = [];
  for (let i = 0; i < runs; i++) {
    checksums.push(create().advance(steps).checksum());
  }

  const uniqueChecksums = [...new Set(checksums)];
  return { deterministic: uniqueChecksums.length === 1, checksums, uniqueChecksums };
}

/**
 * @throws {DeterminismViolationError} if any two runs end in different grids
 *
 * @example
 * ```typescript
 * it("sand is reproducible", () => {
 *   assertDeterministic(
 *     () => new AutomatonBuilder().fromText(text).withRule(sandRule({ random: new SeededRandom(7) })).build().getOrThrow(),
 *     50,
 *   );
 * });
 * ```
 */
export function assertDeterministic(
  create: () => Automaton,
  steps: number,
  runs: number = 3,
): void {
  const report = testDeterminism(create, steps, runs);
  if (!report.deterministic) {
    throw new DeterminismViolationError(report.uniqueChecksums, steps);
  }
}
