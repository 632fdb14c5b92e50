import {
  Allele,
  CONTINUOUS,
  Encoding,
  isPrintableAlphabet,
  sequenceAlphabet,
} from '../genome/alphabet';
import { genericDecoder } from '../genome/decoder';
import type { Ploidy } from '../genome/genotype';
import { selection } from '../methods/selection';
import { ConfigurationError } from '../utils/errors';
import { RandomSource, createRandomSource } from '../utils/random';
import {
  DEFAULT_FLOAT_SIGMA,
  DEFAULT_FLOAT_SIGMA_ADAPT,
  DEFAULT_NUMBER_CHILDREN,
  DEFAULT_OVERPOPULATION,
  DEFAULT_POPULATION_GROWTH,
  DEFAULT_PROBABILITIES,
  DIPLOID_ALPHABET,
  HAPLOID_ALPHABET,
} from './optimizer.constants';
import type {
  OptimizerOptions,
  ResolvedOptions,
  TunableParameters,
} from './optimizer.types';

/**
 * Validate construction options and fill in every default.
 *
 * Resolution happens once per optimizer; the engine never looks at the raw
 * options again.
 *
 * @throws {ConfigurationError} for any impossible combination of options.
 */
export function resolveOptions(options: OptimizerOptions): ResolvedOptions {
  if (typeof options.objective !== 'function')
    throw new ConfigurationError('objective must be a function');
  requirePositiveInteger('populationSize', options.populationSize);
  requirePositiveInteger('numberChromosomes', options.numberChromosomes);

  const chromosomeLengths = resolveLengths(options);
  const pmx = options.pmx ?? false;
  const numberChildren = options.numberChildren ?? DEFAULT_NUMBER_CHILDREN;
  const ploidy = resolvePloidy(options.chromosomeSets ?? 1);

  if (pmx) {
    if (options.alphabet === CONTINUOUS)
      throw new ConfigurationError('For PMX, the alphabet cannot be continuous');
    if (ploidy !== 1)
      throw new ConfigurationError('PMX only works with haploid chromosome sets');
    if (numberChildren !== 2)
      throw new ConfigurationError('PMX always produces exactly two children');
  }
  if (!Number.isInteger(numberChildren) || numberChildren < 2 || numberChildren % 2 !== 0)
    throw new ConfigurationError(
      `numberChildren must be a positive multiple of 2, got ${numberChildren}`
    );

  const encoding = resolveEncoding(options.alphabet, pmx, ploidy, chromosomeLengths);
  if (encoding.kind === 'continuous' && ploidy === 2)
    throw new ConfigurationError(
      'Continuous allele alphabets only work with haploid chromosomes'
    );
  const characterAlphabet =
    encoding.kind !== 'continuous' && isPrintableAlphabet(encoding.symbols);

  return Object.freeze({
    objective: options.objective,
    decoder: options.decoder ?? genericDecoder,
    hook: options.hook,
    numberChromosomes: options.numberChromosomes,
    chromosomeLengths: Object.freeze(chromosomeLengths),
    populationSize: options.populationSize,
    encoding,
    ploidy,
    characterAlphabet,
    monogamous: options.monogamous ?? false,
    numberChildren,
    bestImmortal: options.bestImmortal ?? true,
    parallel: options.parallel ?? false,
    random: resolveRandom(options),
    tunables: Object.freeze(resolveTunables(options, encoding, characterAlphabet)),
  });
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1)
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
}

function resolveLengths(options: OptimizerOptions): number[] {
  const { chromosomeLengths, numberChromosomes } = options;
  const lengths =
    typeof chromosomeLengths === 'number'
      ? Array.from({ length: numberChromosomes }, () => chromosomeLengths)
      : chromosomeLengths.slice();
  if (lengths.length !== numberChromosomes)
    throw new ConfigurationError(
      `chromosomeLengths must have exactly numberChromosomes (${numberChromosomes}) elements, got ${lengths.length}`
    );
  lengths.forEach((length, i) => requirePositiveInteger(`chromosomeLengths[${i}]`, length));
  return lengths;
}

function resolvePloidy(sets: number): Ploidy {
  if (sets === 1 || sets === 2) return sets;
  throw new ConfigurationError(`The number of chromosome sets can only be 1 or 2, got ${sets}`);
}

function resolveEncoding(
  alphabet: OptimizerOptions['alphabet'],
  pmx: boolean,
  ploidy: Ploidy,
  lengths: readonly number[]
): Encoding {
  if (alphabet === CONTINUOUS) return { kind: 'continuous' };

  let symbols: readonly Allele[];
  if (alphabet === undefined) {
    if (pmx) symbols = sequenceAlphabet(lengths[0]);
    else symbols = ploidy === 1 ? HAPLOID_ALPHABET : DIPLOID_ALPHABET;
  } else {
    if (!Array.isArray(alphabet))
      throw new ConfigurationError(
        'The allele alphabet must be an array of symbols or CONTINUOUS'
      );
    symbols = alphabet;
  }

  const allNumbers = symbols.every((s) => typeof s === 'number');
  const allStrings = symbols.every((s) => typeof s === 'string');
  if (symbols.length < 2 || !(allNumbers || allStrings))
    throw new ConfigurationError(
      'The allele alphabet must hold at least two symbols, all numbers or all strings'
    );
  symbols = Object.freeze(symbols.slice());

  if (!pmx) return { kind: 'discrete', symbols };

  if (lengths.some((length) => length !== symbols.length))
    throw new ConfigurationError(
      'For PMX, the chromosome length must be the same as the alphabet length in all chromosomes'
    );
  if (new Set(symbols).size !== symbols.length)
    throw new ConfigurationError('For PMX, the alphabet symbols must be distinct');
  return { kind: 'permutation', symbols };
}

function resolveTunables(
  options: OptimizerOptions,
  encoding: Encoding,
  characterAlphabet: boolean
): TunableParameters {
  const defaults = DEFAULT_PROBABILITIES[encoding.kind];
  const tunables: TunableParameters = {
    pCrossover: options.pCrossover ?? defaults.pCrossover,
    pMutation: options.pMutation ?? defaults.pMutation,
    pInversion: options.pInversion ?? defaults.pInversion,
    populationGrowth: options.populationGrowth ?? DEFAULT_POPULATION_GROWTH,
    overpopulation: options.overpopulation ?? DEFAULT_OVERPOPULATION,
    fitnessScale:
      options.fitnessScale === undefined
        ? encoding.kind === 'discrete' && !characterAlphabet
          ? selection.LINEAR_SCALING.scale
          : null
        : options.fitnessScale,
    floatSigma: options.floatSigma ?? DEFAULT_FLOAT_SIGMA,
    floatSigmaAdapt: options.floatSigmaAdapt ?? DEFAULT_FLOAT_SIGMA_ADAPT,
  };
  validateTunables(tunables);
  return tunables;
}

/**
 * Check tunable parameters; also run before every generation since hooks may
 * change them.
 *
 * @throws {ConfigurationError}
 */
export function validateTunables(tunables: Readonly<TunableParameters>): void {
  const probabilities = ['pCrossover', 'pMutation', 'pInversion'] as const;
  for (const name of probabilities) {
    const p = tunables[name];
    if (!(p >= 0 && p <= 1))
      throw new ConfigurationError(`${name} must lie in [0, 1], got ${p}`);
  }
  const positives = [
    'populationGrowth',
    'overpopulation',
    'floatSigma',
    'floatSigmaAdapt',
  ] as const;
  for (const name of positives) {
    const value = tunables[name];
    if (!(value > 0 && Number.isFinite(value)))
      throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
  const scale = tunables.fitnessScale;
  if (scale !== null && !(scale > 1 && Number.isFinite(scale)))
    throw new ConfigurationError(`Fitness scale must be > 1 or null, got ${scale}`);
}

function resolveRandom(options: OptimizerOptions): RandomSource {
  if (options.rng && options.seed !== undefined)
    throw new ConfigurationError('Pass either rng or seed, not both');
  return options.rng ?? createRandomSource(options.seed);
}
