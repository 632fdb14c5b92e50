/**
 * Public entry point.
 *
 * @example
 * import { Optimizer, CONTINUOUS } from 'allelic-ts';
 */
import Optimizer from './optimizer';
import Genotype from './genome/genotype';
import Multi from './multithreading/multi';
import * as methods from './methods/methods';

export { Optimizer, Genotype, Multi, methods };
export { config } from './config';
export type { AllelicConfig } from './config';
export {
  CONTINUOUS,
  ALPHA_ALPHABET,
  ALNUM_ALPHABET,
  CHARACTER_ALPHABET,
  isPrintableAlphabet,
} from './genome/alphabet';
export type {
  Allele,
  AlphabetInput,
  Encoding,
  DiscreteEncoding,
  ContinuousEncoding,
  PermutationEncoding,
} from './genome/alphabet';
export type { Chromosome, GenomeLayout, GenomeView, Ploidy } from './genome/genotype';
export { genericDecoder, binaryFraction, expressDominance } from './genome/decoder';
export type { GenericPhenotype, GenericValue } from './genome/decoder';
export {
  OptimizerError,
  ConfigurationError,
  InvalidFitnessError,
  UnsupportedEncodingError,
} from './utils/errors';
export { createRandomSource } from './utils/random';
export type { RandomSource } from './utils/random';
export type {
  BestFit,
  Decoder,
  GenerationStatistics,
  Hook,
  Objective,
  OptimizerOptions,
  OptimizerView,
  Phenotype,
  TunableParameters,
} from './optimizer/optimizer.types';
