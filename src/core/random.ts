/**
 * Injectable randomness.
 *
 * Crash candidates and observation replicas are drawn from a `RandomSource`
 * so that a scenario run can be replayed from its seed.
 */

/**
 * Source of uniformly distributed numbers in `[0, 1)`.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Ambient, unseeded randomness.
 */
export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Creates a deterministic source (mulberry32) from a 32-bit seed.
 *
 * @example
 * ```typescript
 * const random = createSeededRandom(42);
 * const order = shuffle([0, 1, 2, 3], random);
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Returns a random integer between min and max (inclusive).
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle for unbiased random selection.
 */
export function shuffle<T>(array: readonly T[], random: RandomSource): T[] {
  const result = [...array];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i);
    [result[i], result[j]] = [result[j]!, result[i]!];
  }
  return result;
}

/**
 * Picks one element uniformly at random.
 *
 * @throws {RangeError} If the array is empty
 */
export function pickRandom<T>(array: readonly T[], random: RandomSource): T {
  if (array.length === 0) {
    throw new RangeError('Cannot pick from an empty array');
  }
  return array[randomInt(random, 0, array.length - 1)]!;
}
