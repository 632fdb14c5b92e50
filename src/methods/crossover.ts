import Genotype, { Chromosome } from '../genome/genotype';
import { RandomSource, randomInt, randomIntBetween } from '../utils/random';

/**
 * Crossover methods for genetic algorithms.
 *
 * Crossover recombines the genomes of two mates so that offspring inherit
 * complementary sections of both parents. Two variants are provided:
 *
 * - `SIMPLE`: one-point crossover per chromosome, drawn independently for every
 *   pair of children. Used directly on haploid genomes and on the gametes of
 *   diploid genomes during meiosis.
 * - `PARTIALLY_MATCHED`: segment exchange that keeps each chromosome a
 *   permutation of the alphabet (PMX, see Goldberg 1989).
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */
export const crossover = {
  /**
   * Single-point crossover with the point drawn uniformly over interior
   * positions, with probability `pCrossover` per chromosome and pair of children.
   */
  SIMPLE: {
    name: 'SIMPLE',
  },

  /**
   * Partially matched crossover. A random inclusive segment is exchanged
   * between the two parents and displaced alleles are relocated so that no
   * symbol is duplicated or lost. Always produces exactly two children.
   */
  PARTIALLY_MATCHED: {
    name: 'PARTIALLY_MATCHED',
  },
} as const;

/** Parameters consumed by the crossover operators. */
export interface CrossoverContext {
  /** Probability of crossing each chromosome. */
  readonly pCrossover: number;
  /** Children per mating; even. Ignored by partially matched crossover. */
  readonly numberChildren: number;
  readonly random: RandomSource;
}

/** Offspring of one operator application and the number of events counted. */
export interface OperatorResult {
  readonly offspring: Genotype[];
  readonly events: number;
}

/**
 * Simple (one-point) crossover between two haploid genomes.
 *
 * For every pair of children and every chromosome a crossover point is drawn
 * with probability `pCrossover` (otherwise the point is the full length). The
 * first child of the pair takes the first parent's genes before the point and
 * the second parent's genes after it, the second child the opposite.
 *
 * @returns `numberChildren` haploid offspring; `events` counts chromosomes actually split.
 */
export function simpleCrossover(
  parentA: Genotype,
  parentB: Genotype,
  context: CrossoverContext
): OperatorResult {
  if (!parentA.haploid || !parentB.haploid)
    throw new Error('Simple crossover requires haploid genomes');
  const { pCrossover, numberChildren, random } = context;
  const lengths = parentA.chromosomeLengths;
  const offspring: Genotype[] = [];
  let events = 0;

  for (let n = 0; n < numberChildren; n += 2) {
    // one crossover point per chromosome for this pair of children
    const points = lengths.map((length) => {
      if (length > 1 && random() < pCrossover) {
        events++;
        return randomIntBetween(random, 1, length);
      }
      return length;
    });

    const first: Chromosome[] = [];
    const second: Chromosome[] = [];
    lengths.forEach((length, i) => {
      const a: Chromosome = [];
      const b: Chromosome = [];
      for (let j = 0; j < length; j++) {
        const fromA = parentA.allele(i, j);
        const fromB = parentB.allele(i, j);
        if (j < points[i]) {
          a.push([fromA]);
          b.push([fromB]);
        } else {
          a.push([fromB]);
          b.push([fromA]);
        }
      }
      first.push(a);
      second.push(b);
    });
    offspring.push(
      Genotype.fromGenome(first, 1, parentA.encoding),
      Genotype.fromGenome(second, 1, parentA.encoding)
    );
  }

  return { offspring, events };
}

/**
 * Partially matched crossover between two permutation genomes.
 *
 * Children start as copies of their parents. For each chromosome, with
 * probability `pCrossover`, two positions are drawn (in either order) and for
 * every position of the inclusive range the alleles of the two children are
 * exchanged; in each child the incoming allele's previous position receives
 * the displaced allele, so both chromosomes remain permutations.
 *
 * @returns two children; `events` counts exchanged segments (not positions).
 */
export function partiallyMatchedCrossover(
  parentA: Genotype,
  parentB: Genotype,
  context: Pick<CrossoverContext, 'pCrossover' | 'random'>
): OperatorResult {
  const { pCrossover, random } = context;
  const first = parentA.copy();
  const second = parentB.copy();
  let events = 0;

  first.chromosomeLengths.forEach((length, i) => {
    if (random() >= pCrossover) return;
    let low = randomInt(random, length);
    let high = randomInt(random, length);
    if (low > high) [low, high] = [high, low];

    for (let j = low; j <= high; j++) {
      const alleleA = first.allele(i, j);
      const alleleB = second.allele(i, j);
      // positions where the incoming alleles currently sit
      const inA = first.column(i).indexOf(alleleB);
      const inB = second.column(i).indexOf(alleleA);
      first.setAllele(i, j, 0, alleleB);
      second.setAllele(i, j, 0, alleleA);
      first.setAllele(i, inA, 0, alleleA);
      second.setAllele(i, inB, 0, alleleB);
    }
    events++;
  });

  return { offspring: [first, second], events };
}
