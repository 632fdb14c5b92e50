/**
 * Default parameters of the optimizer.
 *
 * Encoding dependent defaults live in one table so that option resolution is
 * the only place that branches on them.
 */
import type { Encoding } from '../genome/alphabet';

/** Operator probabilities per encoding kind. */
export const DEFAULT_PROBABILITIES = {
  discrete: { pCrossover: 0.6, pMutation: 0.0333, pInversion: 0 },
  continuous: { pCrossover: 0, pMutation: 0.3, pInversion: 0 },
  permutation: { pCrossover: 0.9, pMutation: 0.4, pInversion: 0 },
} as const satisfies Record<
  Encoding['kind'],
  { pCrossover: number; pMutation: number; pInversion: number }
>;

export const DEFAULT_POPULATION_GROWTH = 1.0;
export const DEFAULT_OVERPOPULATION = 1.3;
export const DEFAULT_NUMBER_CHILDREN = 2;
export const DEFAULT_FLOAT_SIGMA = 1.2;
export const DEFAULT_FLOAT_SIGMA_ADAPT = 0.85;

/** Generations between two adaptations of `floatSigma`. */
export const SIGMA_ADAPTATION_INTERVAL = 5;

export const HAPLOID_ALPHABET: readonly number[] = Object.freeze([0, 1]);
export const DIPLOID_ALPHABET: readonly number[] = Object.freeze([-1, 0, 1]);
