/**
 * Shared types of the optimizer facade and its delegate modules.
 *
 * Delegates are plain functions bound to the optimizer through `this`; they
 * only see the `OptimizerInternals` surface so that none of them has to import
 * the concrete `Optimizer` class.
 */
import type { AlphabetInput, Encoding } from '../genome/alphabet';
import type Genotype from '../genome/genotype';
import type { Ploidy } from '../genome/genotype';
import type { RandomSource } from '../utils/random';

/** Argument list handed to the objective function. */
export type Phenotype = unknown[];

/** Objective function: decoded arguments in, non-negative fitness out (higher is better). */
export type Objective = (...args: Phenotype) => number | Promise<number>;

/** Maps a genotype onto the argument list of the objective function. */
export type Decoder = (genotype: Genotype) => Phenotype;

/** Progress hook invoked after every generation, generation 0 included. */
export type Hook = (optimizer: OptimizerView) => void | Promise<void>;

/**
 * Parameters that may change between generations, typically from a hook
 * implementing an adaptive strategy.
 */
export interface TunableParameters {
  /** Probability of crossing each chromosome of a mating. */
  pCrossover: number;
  /** Probability of mutating each gene (per chromosome set). */
  pMutation: number;
  /** Probability of inverting a section of each chromosome (per chromosome set). */
  pInversion: number;
  /** Net growth factor of the population per generation. */
  populationGrowth: number;
  /** Over-population factor of the offspring pool before survivor selection. */
  overpopulation: number;
  /** Linear fitness scaling factor (> 1), `null` disables scaling. */
  fitnessScale: number | null;
  /** Standard deviation of Gaussian mutation of continuous genes. */
  floatSigma: number;
  /** Factor applied to `floatSigma` every 5 generations. */
  floatSigmaAdapt: number;
}

/**
 * Construction-time options of an optimizer.
 *
 * `objective`, `decoder` and `hook` use method syntax so that objectives with
 * concrete parameter types (`(x: number) => number`) are accepted as they are.
 *
 * @example
 * const options: OptimizerOptions = {
 *   objective: (x: number) => 1 - (x - 0.5) ** 2,
 *   numberChromosomes: 1,
 *   chromosomeLengths: 16,
 *   populationSize: 20,
 * };
 */
export interface OptimizerOptions extends Partial<TunableParameters> {
  objective(...args: Phenotype): number | Promise<number>;
  numberChromosomes: number;
  /** One length per chromosome, or one length shared by all of them. */
  chromosomeLengths: number | readonly number[];
  populationSize: number;
  /** Defaults to the generic decoder. */
  decoder?(genotype: Genotype): Phenotype;
  /**
   * Symbols a gene may take, or `CONTINUOUS` for the unit interval.
   * Defaults: [0, 1] haploid, [-1, 0, 1] diploid, [0 .. length-1] with `pmx`.
   */
  alphabet?: AlphabetInput;
  /** Chromosomes are permutations of the alphabet (partially matched crossover). */
  pmx?: boolean;
  /** 1 (haploid, default) or 2 (diploid). */
  chromosomeSets?: number;
  monogamous?: boolean;
  /** Children per mating; even, exactly 2 with `pmx`. */
  numberChildren?: number;
  /** Carry the best individual unchanged into the next generation (default true). */
  bestImmortal?: boolean;
  hook?(optimizer: OptimizerView): void | Promise<void>;
  /**
   * Evaluate the offspring pool through a bounded concurrent pool. Every call
   * stays on the main event loop: asynchronous objectives overlap, synchronous
   * ones still run one at a time, so this gives no CPU parallelism.
   */
  parallel?: boolean;
  /** Seed of a reproducible random source. */
  seed?: number | string;
  /** Custom uniform random source in [0, 1). Exclusive with `seed`. */
  rng?: RandomSource;
}

/** Options after defaulting and validation; frozen. */
export interface ResolvedOptions {
  readonly objective: Objective;
  readonly decoder: Decoder;
  readonly hook?: Hook;
  readonly numberChromosomes: number;
  readonly chromosomeLengths: readonly number[];
  readonly populationSize: number;
  readonly encoding: Encoding;
  readonly ploidy: Ploidy;
  readonly characterAlphabet: boolean;
  readonly monogamous: boolean;
  readonly numberChildren: number;
  readonly bestImmortal: boolean;
  readonly parallel: boolean;
  readonly random: RandomSource;
  /** Initial values of the tunable parameters. */
  readonly tunables: Readonly<TunableParameters>;
}

/**
 * Statistics of one generation, recorded before survivor selection.
 * `divorceRate` is only present for monogamous mating.
 */
export interface GenerationStatistics {
  readonly mean: number;
  readonly variance: number;
  readonly min: number;
  readonly max: number;
  readonly crossovers: number;
  readonly mutations: number;
  readonly inversions: number;
  readonly divorceRate?: number;
}

/** Best individual of the current population. */
export interface BestFit {
  readonly genotype: Genotype;
  readonly phenotype: Phenotype;
  readonly fitness: number;
}

/** Operator counts of the generation in progress. */
export interface OperatorCounters {
  crossovers: number;
  mutations: number;
  inversions: number;
  divorceRate: number;
}

/** What a progress hook may read (and, for tunables, write). */
export interface OptimizerView extends TunableParameters {
  readonly objective: Objective;
  readonly decoder: Decoder;
  readonly statistics: readonly GenerationStatistics[];
  /** Index of the latest recorded generation; -1 before initialization. */
  readonly generation: number;
  readonly population: readonly Genotype[];
  readonly pmx: boolean;
  readonly bestFit: BestFit;
}

/**
 * Internal surface the delegate modules operate on.
 * @internal
 */
export interface OptimizerInternals extends OptimizerView {
  readonly _options: ResolvedOptions;
  readonly _random: RandomSource;
  _population: Genotype[];
  _statistics: GenerationStatistics[];
  /** Target size of the current population. */
  _populationSize: number;
  _counters: OperatorCounters;
}
