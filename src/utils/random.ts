import seedrandom from 'seedrandom';

/** Uniform random source returning values in [0, 1). */
export type RandomSource = () => number;

/**
 * Build the random source used by every stochastic step of an optimizer.
 *
 * With a seed the sequence is reproducible (seedrandom's ARC4 generator);
 * without one the host `Math.random` is used.
 *
 * @example
 * const rng = createRandomSource(42);
 * rng(); // same value on every run
 */
export function createRandomSource(seed?: number | string): RandomSource {
  if (seed === undefined) return Math.random;
  const prng = seedrandom(String(seed));
  return () => prng();
}

/** Uniform integer in [0, upper). */
export function randomInt(random: RandomSource, upper: number): number {
  return Math.floor(random() * upper);
}

/** Uniform integer in [low, high). */
export function randomIntBetween(
  random: RandomSource,
  low: number,
  high: number
): number {
  return low + Math.floor(random() * (high - low));
}

/**
 * Normally distributed sample (Box-Muller transform).
 * `1 - random()` keeps the logarithm argument in (0, 1].
 */
export function gaussian(
  random: RandomSource,
  mean: number,
  sigma: number
): number {
  const u1 = 1 - random();
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + sigma * z;
}

/** Fisher-Yates shuffle; reorders `items` in place and returns it. */
export function shuffleInPlace<T>(random: RandomSource, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/** Uniformly random permutation of `items` (new array). */
export function permutation<T>(random: RandomSource, items: readonly T[]): T[] {
  return shuffleInPlace(random, items.slice());
}
