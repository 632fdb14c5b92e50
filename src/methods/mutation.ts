import Genotype from '../genome/genotype';
import { Encoding } from '../genome/alphabet';
import { clamp } from '../utils/math';
import { RandomSource, gaussian, randomInt } from '../utils/random';

/**
 * Mutation methods for genetic algorithms.
 *
 * Mutation introduces genetic diversity by randomly altering single alleles of
 * an offspring genome. The applicable method is fixed by the encoding:
 *
 * - `GAUSSIAN`: continuous genes receive normally distributed noise with
 *   standard deviation `floatSigma`, clamped to [0, 1].
 * - `SWAP`: permutation genomes exchange the alleles at two positions, which
 *   keeps the chromosome a permutation. One swap touches two positions, so the
 *   per-position probability is halved and every swap counts as two mutations.
 * - `FLIP`: biallelic genes switch to the other allele.
 * - `RESAMPLE`: genes of larger alphabets take a uniformly random allele among
 *   the remaining ones (never the current value).
 *
 * Inversion (`invert`) reverses a random section of a chromosome set and is
 * applied independently with probability `pInversion` per chromosome and set.
 *
 * @see {@link https://en.wikipedia.org/wiki/Mutation_(genetic_algorithm)}
 */
export const mutation = {
  GAUSSIAN: { name: 'GAUSSIAN', eventsPerDraw: 1, probabilityFactor: 1 },
  SWAP: { name: 'SWAP', eventsPerDraw: 2, probabilityFactor: 0.5 },
  FLIP: { name: 'FLIP', eventsPerDraw: 1, probabilityFactor: 1 },
  RESAMPLE: { name: 'RESAMPLE', eventsPerDraw: 1, probabilityFactor: 1 },
} as const;

export type MutationMethod =
  | typeof mutation.GAUSSIAN
  | typeof mutation.SWAP
  | typeof mutation.FLIP
  | typeof mutation.RESAMPLE;

/** Mutation method applicable to genomes of the given encoding. */
export function mutationMethodFor(encoding: Encoding): MutationMethod {
  switch (encoding.kind) {
    case 'continuous':
      return mutation.GAUSSIAN;
    case 'permutation':
      return mutation.SWAP;
    case 'discrete':
      return encoding.symbols.length === 2 ? mutation.FLIP : mutation.RESAMPLE;
  }
}

export interface MutationContext {
  /** Probability per gene position and chromosome set. */
  readonly pMutation: number;
  /** Standard deviation of Gaussian mutation (continuous genes). */
  readonly floatSigma: number;
  readonly random: RandomSource;
}

/**
 * Mutate `genotype` in place.
 *
 * @returns number of mutations counted (swaps count twice).
 */
export function mutate(genotype: Genotype, context: MutationContext): number {
  const { pMutation, floatSigma, random } = context;
  if (pMutation === 0) return 0;
  const method = mutationMethodFor(genotype.encoding);
  const threshold = pMutation * method.probabilityFactor;
  const encoding = genotype.encoding;
  let events = 0;

  genotype.chromosomeLengths.forEach((length, i) => {
    for (let j = 0; j < length; j++) {
      for (let k = 0; k < genotype.ploidy; k++) {
        if (random() >= threshold) continue;
        switch (encoding.kind) {
          case 'permutation':
            genotype.swapAlleles(i, j, randomInt(random, length), k);
            break;
          case 'continuous':
            genotype.setAllele(
              i,
              j,
              k,
              clamp(Number(genotype.allele(i, j, k)) + gaussian(random, 0, floatSigma), 0, 1)
            );
            break;
          case 'discrete': {
            const symbols = encoding.symbols;
            const current = symbols.indexOf(genotype.allele(i, j, k));
            if (symbols.length === 2) {
              genotype.setAllele(i, j, k, symbols[1 - current]);
            } else {
              let r = randomInt(random, symbols.length - 1);
              if (r >= current) r++;
              genotype.setAllele(i, j, k, symbols[r]);
            }
            break;
          }
        }
        events += method.eventsPerDraw;
      }
    }
  });

  return events;
}

export interface InversionContext {
  /** Probability per chromosome and chromosome set. */
  readonly pInversion: number;
  readonly random: RandomSource;
}

/**
 * Reverse the genes between two random positions (inclusive, drawn
 * independently and ordered) of each chromosome set with probability `pInversion`.
 *
 * @returns number of inversions performed.
 */
export function invert(genotype: Genotype, context: InversionContext): number {
  const { pInversion, random } = context;
  if (pInversion === 0) return 0;
  let events = 0;

  genotype.chromosomeLengths.forEach((length, i) => {
    for (let k = 0; k < genotype.ploidy; k++) {
      if (random() >= pInversion) continue;
      let low = randomInt(random, length);
      let high = randomInt(random, length);
      if (low > high) [low, high] = [high, low];
      for (; low < high; low++, high--) genotype.swapAlleles(i, low, high, k);
      events++;
    }
  });

  return events;
}
