import type Genotype from '../genome/genotype';
import {
  fittestIndex,
  scaleFitness,
  selectMate,
  selectSurvivors,
} from '../methods/selection';
import { ConfigurationError } from '../utils/errors';
import { roundHalfEven } from '../utils/math';
import { warnOnce } from '../utils/warnings';
import { SIGMA_ADAPTATION_INTERVAL } from './optimizer.constants';
import { evaluate } from './optimizer.evaluate';
import { validateTunables } from './optimizer.options';
import { reproduce } from './optimizer.reproduction';
import { appendStatistics } from './optimizer.statistics';
import type { GenerationStatistics, OptimizerInternals } from './optimizer.types';

/**
 * Evaluate the initial population and record generation 0.
 */
export async function initializeGeneration(
  this: OptimizerInternals
): Promise<GenerationStatistics> {
  await evaluate.call(this, this._population);
  this._counters = { crossovers: 0, mutations: 0, inversions: 0, divorceRate: 0 };
  return appendStatistics.call(this, this._population);
}

/**
 * Advance the population by one generation.
 *
 * Steps:
 * 1) Offspring target = floor(overpopulation * populationSize * populationGrowth),
 *    one less when the best individual is immortal.
 * 2) Select mates by roulette wheel and reproduce (mutation and inversion are
 *    applied to every child) until the offspring pool reaches the target.
 *    Without monogamy every individual may mate again right away; with it,
 *    mates stay excluded until the whole population has mated ("divorce").
 * 3) Append the previous best individual unchanged when immortal.
 * 4) Evaluate the pool and record its statistics.
 * 5) Scale fitness (when `fitnessScale` is set).
 * 6) Keep the fittest round(populationSize * populationGrowth) individuals.
 * 7) Continuous genomes: every 5 generations shrink `floatSigma` when the mean
 *    fitness improved over the last 5 generations, widen it otherwise.
 *
 * @returns statistics recorded for the new generation.
 * @throws {ConfigurationError} when tunables are out of range, the population
 *   would die out, or the offspring pool is smaller than the next population.
 */
export async function evolve(this: OptimizerInternals): Promise<GenerationStatistics> {
  validateTunables(this);
  const options = this._options;
  const random = this._random;
  const population = this._population;

  let offspringTarget = Math.floor(
    this.overpopulation * this._populationSize * this.populationGrowth
  );
  if (options.bestImmortal) offspringTarget -= 1;
  const nextSize = roundHalfEven(this._populationSize * this.populationGrowth);
  if (nextSize < 1)
    throw new ConfigurationError(
      `Population of ${this._populationSize} would die out with populationGrowth ${this.populationGrowth} and overpopulation ${this.overpopulation}`
    );
  // matings always yield numberChildren offspring, so the pool rounds up
  const matings = Math.ceil(Math.max(0, offspringTarget) / options.numberChildren);
  const poolSize = matings * options.numberChildren + (options.bestImmortal ? 1 : 0);
  if (poolSize < nextSize)
    throw new ConfigurationError(
      `Offspring pool of ${poolSize} cannot refill a population of ${nextSize} (populationGrowth ${this.populationGrowth}, overpopulation ${this.overpopulation})`
    );

  this._counters = {
    crossovers: 0,
    mutations: 0,
    inversions: 0,
    divorceRate: options.monogamous ? 0 : 1,
  };

  // 1-2) selective mating
  const size = population.length;
  const consumed = new Set<number>();
  const offspring: Genotype[] = [];
  while (offspring.length < offspringTarget) {
    const i = selectMate(population, consumed, random);
    consumed.add(i);
    if (consumed.size >= size) consumed.clear();
    const j = selectMate(population, consumed, random);

    const children = reproduce.call(this, population[i], population[j]);

    if (options.monogamous) consumed.add(j);
    else consumed.clear();
    offspring.push(...children);
    if (consumed.size >= size) {
      this._counters.divorceRate = (size - consumed.size) / size;
      consumed.clear();
    }
  }

  // 3) immortality
  if (options.bestImmortal) offspring.push(population[fittestIndex(population)]);

  // 4) evaluation and statistics
  await evaluate.call(this, offspring);
  const record = appendStatistics.call(this, offspring);

  // 5) fitness scaling
  if (this.fitnessScale !== null && !scaleFitness(offspring, record, this.fitnessScale))
    warnOnce(
      'degenerate-scaling',
      'Fitness scaling skipped: all individuals of the generation share the same fitness'
    );

  // 6) selection of the fittest
  this._populationSize = nextSize;
  this._population = selectSurvivors(offspring, nextSize, random);

  // 7) float mutation step adaptation
  const generation = this._statistics.length - 1;
  if (
    options.encoding.kind === 'continuous' &&
    generation > 0 &&
    generation % SIGMA_ADAPTATION_INTERVAL === 0
  ) {
    const earlier = this._statistics[generation - SIGMA_ADAPTATION_INTERVAL];
    if (record.mean > earlier.mean) this.floatSigma *= this.floatSigmaAdapt;
    else this.floatSigma /= this.floatSigmaAdapt;
  }

  return record;
}
