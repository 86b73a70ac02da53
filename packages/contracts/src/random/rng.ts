/**
 * Random source contract and helpers that work with any number generator.
 */

/**
 * Anything that yields uniformly distributed doubles in [0, 1).
 *
 * Rules take one of these instead of reaching for a global generator, so a
 * seeded source makes every step reproducible.
 */
export interface RandomGenerator {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle into a new array. Every permutation is equally likely.
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const temp = result[i];
    result[i] = result[j];
    result[j] = temp;
  }
  return result;
}

/**
 * Boolean with given probability. A chance of 1 always passes, 0 never does.
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
