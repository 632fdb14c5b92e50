import Genotype from '../genome/genotype';
import { RandomSource, shuffleInPlace } from '../utils/random';

/**
 * Selection methods used by the optimizer.
 *
 * Mating is fitness proportionate (roulette wheel) over scaled fitness, which
 * makes the spread of scaled fitness values the knob for selection pressure:
 * linear scaling stretches or compresses it each generation. Survivors are the
 * fittest individuals by raw fitness, reinstated in random order.
 *
 * @see {@link https://en.wikipedia.org/wiki/Fitness_proportionate_selection}
 */
export const selection = {
  /**
   * Linear map `a * raw + b` aiming the scaled maximum at `scale` times the
   * scaled mean while keeping every scaled value non-negative. `scale` is the
   * default `fitnessScale` of discrete, non-character genomes.
   */
  LINEAR_SCALING: {
    name: 'LINEAR_SCALING',
    scale: 1.6,
  },
} as const;

/**
 * Roulette-wheel mate selection.
 *
 * A threshold is drawn uniformly in [0, sum of eligible scaled fitness); the
 * population is walked accumulating scaled fitness until the running sum
 * reaches it. When rounding keeps the sum below the threshold, the eligible
 * individual with the highest index is chosen.
 *
 * @returns index of the selected mate in `population`.
 */
export function selectMate(
  population: readonly Genotype[],
  excluded: ReadonlySet<number>,
  random: RandomSource
): number {
  let total = 0;
  population.forEach((individual, i) => {
    if (!excluded.has(i)) total += individual.scaledFitness ?? 0;
  });

  const threshold = random() * total;
  let cumulative = 0;
  let lastEligible = population.length - 1;
  for (let i = 0; i < population.length; i++) {
    if (excluded.has(i)) continue;
    lastEligible = i;
    cumulative += population[i].scaledFitness ?? 0;
    if (cumulative >= threshold) return i;
  }
  return lastEligible;
}

/** Fitness summary consumed by linear scaling. */
export interface FitnessSummary {
  readonly min: number;
  readonly mean: number;
  readonly max: number;
}

/** Coefficients of the scaling map `scaled = a * raw + b`. */
export interface ScalingCoefficients {
  readonly a: number;
  readonly b: number;
}

/**
 * Coefficients of linear fitness scaling with factor `scale` (> 1).
 *
 * If the scaled minimum can stay non-negative while the scaled maximum reaches
 * `scale * mean` (that is `mean <= (max + min * (scale - 1)) / scale`) then
 * `a = mean * (scale - 1) / (max - mean)`, otherwise the map stretches as far
 * as the minimum allows, `a = mean / (mean - min)`. In both cases
 * `b = mean * (1 - a)`, which preserves the mean.
 *
 * @returns `undefined` when all fitness values are equal (no spread to scale).
 */
export function linearScaling(
  summary: FitnessSummary,
  scale: number
): ScalingCoefficients | undefined {
  const { min, mean, max } = summary;
  if (max <= mean || mean <= min) return undefined;
  const a =
    mean <= (max + min * (scale - 1)) / scale
      ? (mean * (scale - 1)) / (max - mean)
      : mean / (mean - min);
  return { a, b: mean * (1 - a) };
}

/**
 * Apply linear scaling to the scaled fitness of `population` in place.
 * Scaled values are clipped at 0 to absorb round-off.
 *
 * @returns false when the population has no fitness spread and was left untouched.
 */
export function scaleFitness(
  population: readonly Genotype[],
  summary: FitnessSummary,
  scale: number
): boolean {
  const coefficients = linearScaling(summary, scale);
  if (!coefficients) return false;
  const { a, b } = coefficients;
  for (const individual of population) {
    individual.scaledFitness = Math.max(0, (individual.fitness ?? 0) * a + b);
  }
  return true;
}

/**
 * Survivor selection: keep the `target` fittest individuals by raw fitness
 * (ties keep their original order), then shuffle them so that their order
 * carries no bias into the next round of mate selection.
 *
 * A population already of size `target` is returned unchanged.
 */
export function selectSurvivors(
  population: Genotype[],
  target: number,
  random: RandomSource
): Genotype[] {
  if (population.length === target) return population;
  const ranked = population
    .map((_, i) => i)
    .sort((a, b) => (population[b].fitness ?? 0) - (population[a].fitness ?? 0))
    .slice(0, target);
  return shuffleInPlace(random, ranked).map((i) => population[i]);
}

/** Index of the first individual with the highest raw fitness. */
export function fittestIndex(population: readonly Genotype[]): number {
  let best = 0;
  for (let i = 1; i < population.length; i++) {
    if ((population[i].fitness ?? 0) > (population[best].fitness ?? 0)) best = i;
  }
  return best;
}
