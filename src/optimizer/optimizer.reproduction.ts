import type Genotype from '../genome/genotype';
import {
  OperatorResult,
  crossover,
  partiallyMatchedCrossover,
  simpleCrossover,
} from '../methods/crossover';
import { meiosis, reproduceDiploid } from '../methods/meiosis';
import { invert, mutate } from '../methods/mutation';
import type { OptimizerInternals, ResolvedOptions } from './optimizer.types';

export type ReproductionMethod =
  | typeof crossover.PARTIALLY_MATCHED
  | typeof crossover.SIMPLE
  | typeof meiosis.MEIOSIS;

/**
 * Reproduction operator implied by the genome layout: partially matched
 * crossover for permutations, simple crossover for haploid genomes and
 * meiosis plus fertilization for diploid ones.
 */
export function reproductionMethod(options: ResolvedOptions): ReproductionMethod {
  if (options.encoding.kind === 'permutation') return crossover.PARTIALLY_MATCHED;
  return options.ploidy === 1 ? crossover.SIMPLE : meiosis.MEIOSIS;
}

/**
 * Produce the children of one mating, mutate and invert each of them and add
 * the operator events to the counters of the current generation.
 */
export function reproduce(
  this: OptimizerInternals,
  mother: Genotype,
  father: Genotype
): Genotype[] {
  const random = this._random;
  const context = {
    pCrossover: this.pCrossover,
    numberChildren: this._options.numberChildren,
    random,
  };

  const method = reproductionMethod(this._options);
  let result: OperatorResult;
  switch (method.name) {
    case 'PARTIALLY_MATCHED':
      result = partiallyMatchedCrossover(mother, father, context);
      break;
    case 'SIMPLE':
      result = simpleCrossover(mother, father, context);
      break;
    case 'MEIOSIS':
      result = reproduceDiploid(mother, father, context);
      break;
  }
  this._counters.crossovers += result.events;

  for (const child of result.offspring) {
    this._counters.mutations += mutate(child, {
      pMutation: this.pMutation,
      floatSigma: this.floatSigma,
      random,
    });
    this._counters.inversions += invert(child, {
      pInversion: this.pInversion,
      random,
    });
  }
  return result.offspring;
}
