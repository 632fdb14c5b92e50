import type Genotype from './genome/genotype';
import { fittestIndex } from './methods/selection';
import { evolve, initializeGeneration } from './optimizer/optimizer.evolve';
import { resolveOptions } from './optimizer/optimizer.options';
import { createInitialPopulation } from './optimizer/optimizer.population';
import { describe } from './optimizer/optimizer.report';
import {
  exportStatisticsCSV,
  exportStatisticsJSONL,
} from './optimizer/optimizer.statistics';
import type {
  BestFit,
  Decoder,
  GenerationStatistics,
  Objective,
  OperatorCounters,
  OptimizerInternals,
  OptimizerOptions,
  ResolvedOptions,
} from './optimizer/optimizer.types';
import type { RandomSource } from './utils/random';

/**
 * Genetic algorithm optimizer.
 *
 * Evolves a population of genotypes towards high values of a user supplied
 * objective function by fitness proportionate mating, crossover (simple,
 * partially matched or meiosis for diploid genomes), mutation, inversion,
 * linear fitness scaling and selection of the fittest.
 *
 * The class is a thin facade: each stage lives in `optimizer/optimizer.*.ts`
 * and is bound to the instance through `this`.
 *
 * @example
 * const ga = await Optimizer.create({
 *   objective: (x: number) => Math.max(0, 1 - 4 * (x - 0.15) ** 2),
 *   numberChromosomes: 1,
 *   chromosomeLengths: 32,
 *   populationSize: 30,
 * });
 * await ga.run(20);
 * ga.bestFit.fitness; // close to 1
 */
export default class Optimizer implements OptimizerInternals {
  pCrossover: number;
  pMutation: number;
  pInversion: number;
  populationGrowth: number;
  overpopulation: number;
  fitnessScale: number | null;
  floatSigma: number;
  floatSigmaAdapt: number;

  /** @internal */
  readonly _options: ResolvedOptions;
  /** @internal */
  readonly _random: RandomSource;
  /** @internal */
  _population: Genotype[];
  /** @internal */
  _statistics: GenerationStatistics[] = [];
  /** @internal */
  _populationSize: number;
  /** @internal */
  _counters: OperatorCounters = {
    crossovers: 0,
    mutations: 0,
    inversions: 0,
    divorceRate: 0,
  };
  /** Pending or completed evaluation of generation 0. */
  private _ready?: Promise<void>;

  /**
   * Validate the options and draw the random initial population. Generation 0
   * is evaluated by `initialize()` (called implicitly by `evolve` and `run`).
   *
   * @throws {ConfigurationError} for invalid options.
   */
  constructor(options: OptimizerOptions) {
    this._options = resolveOptions(options);
    const tunables = this._options.tunables;
    this.pCrossover = tunables.pCrossover;
    this.pMutation = tunables.pMutation;
    this.pInversion = tunables.pInversion;
    this.populationGrowth = tunables.populationGrowth;
    this.overpopulation = tunables.overpopulation;
    this.fitnessScale = tunables.fitnessScale;
    this.floatSigma = tunables.floatSigma;
    this.floatSigmaAdapt = tunables.floatSigmaAdapt;
    this._random = this._options.random;
    this._populationSize = this._options.populationSize;
    this._population = createInitialPopulation(this._options);
  }

  /** Construct and initialize an optimizer. */
  static async create(options: OptimizerOptions): Promise<Optimizer> {
    const optimizer = new Optimizer(options);
    await optimizer.initialize();
    return optimizer;
  }

  /**
   * Evaluate the initial population, record generation 0 and call the hook.
   * Later calls resolve immediately; a failed initialization may be retried.
   */
  initialize(): Promise<void> {
    if (!this._ready) {
      this._ready = this._initialize().catch((error: unknown) => {
        this._ready = undefined;
        throw error;
      });
    }
    return this._ready;
  }

  private async _initialize(): Promise<void> {
    await initializeGeneration.call(this);
    await this._notify();
  }

  private async _notify(): Promise<void> {
    const hook = this._options.hook;
    if (hook) await hook(this);
  }

  /**
   * Compute one generation and call the hook.
   * @returns statistics of the new generation (before survivor selection).
   */
  async evolve(): Promise<GenerationStatistics> {
    await this.initialize();
    const record = await evolve.call(this);
    await this._notify();
    return record;
  }

  /**
   * Run `generations` generations, stopping early after the first generation
   * in which an individual reaches `maxFitness`. The hook runs after every
   * generation, the stopping one included.
   *
   * @returns best individual of the final population.
   */
  async run(generations: number, maxFitness?: number): Promise<BestFit> {
    await this.initialize();
    for (let n = 0; n < generations; n++) {
      await evolve.call(this);
      await this._notify();
      if (maxFitness !== undefined && this.bestFit.fitness >= maxFitness) break;
    }
    return this.bestFit;
  }

  get objective(): Objective {
    return this._options.objective;
  }

  get decoder(): Decoder {
    return this._options.decoder;
  }

  /** Statistics per generation, index = generation number. */
  get statistics(): readonly GenerationStatistics[] {
    return this._statistics;
  }

  /** Latest recorded generation; 0 after initialization, -1 before. */
  get generation(): number {
    return this._statistics.length - 1;
  }

  get population(): readonly Genotype[] {
    return this._population;
  }

  get pmx(): boolean {
    return this._options.encoding.kind === 'permutation';
  }

  /**
   * First individual of maximal fitness with its decoded phenotype.
   * @throws {Error} before the population has been evaluated.
   */
  get bestFit(): BestFit {
    const genotype = this._population[fittestIndex(this._population)];
    const fitness = genotype.fitness;
    if (fitness === undefined)
      throw new Error('Population has not been evaluated; call initialize() first');
    return { genotype, phenotype: this._options.decoder(genotype), fitness };
  }

  /** Statistics history as CSV (header plus one row per generation). */
  exportStatisticsCSV(): string {
    return exportStatisticsCSV.call(this);
  }

  /** Statistics history as JSON Lines. */
  exportStatisticsJSONL(): string {
    return exportStatisticsJSONL.call(this);
  }

  toString(): string {
    return describe.call(this);
  }
}
