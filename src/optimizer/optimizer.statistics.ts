/**
 * Generation statistics and their exports.
 *
 * One record is appended per generation, computed over the offspring pool
 * before survivor selection (generation 0 covers the initial population).
 * Records are frozen once appended.
 */
import type Genotype from '../genome/genotype';
import { clamp } from '../utils/math';
import type { GenerationStatistics, OptimizerInternals } from './optimizer.types';

/**
 * Summarize the raw fitness of `population` together with the operator
 * counters of the current generation and append the record.
 *
 * The mean is clamped into [min, max] and the variance at 0 so that
 * floating-point round-off cannot break `min <= mean <= max`.
 */
export function appendStatistics(
  this: OptimizerInternals,
  population: readonly Genotype[]
): GenerationStatistics {
  let sum = 0;
  let sumSquares = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const individual of population) {
    const fitness = individual.fitness ?? 0;
    sum += fitness;
    sumSquares += fitness * fitness;
    if (fitness < min) min = fitness;
    if (fitness > max) max = fitness;
  }
  const size = population.length;
  const mean = clamp(sum / size, min, max);
  const { crossovers, mutations, inversions, divorceRate } = this._counters;

  const record: GenerationStatistics = Object.freeze({
    mean,
    variance: Math.max(0, sumSquares / size - mean * mean),
    min,
    max,
    crossovers,
    mutations,
    inversions,
    ...(this._options.monogamous ? { divorceRate } : {}),
  });
  this._statistics.push(record);
  return record;
}

/** Per-generation fields in export order, after the generation index. */
const FIELDS = [
  'mean',
  'variance',
  'min',
  'max',
  'crossovers',
  'mutations',
  'inversions',
] as const;

/**
 * Export the statistics history as CSV: a header row, then one row per
 * generation. The `divorceRate` column is only present for monogamous mating.
 *
 * @example
 * generation,mean,variance,min,max,crossovers,mutations,inversions
 * 0,0.5,0.01,0.3,0.7,0,0,0
 */
export function exportStatisticsCSV(this: OptimizerInternals): string {
  const monogamous = this._options.monogamous;
  const header = ['generation', ...FIELDS, ...(monogamous ? ['divorceRate'] : [])];
  const rows = this._statistics.map((record, generation) =>
    [
      generation,
      ...FIELDS.map((field) => record[field]),
      ...(monogamous ? [record.divorceRate ?? ''] : []),
    ].join(',')
  );
  return [header.join(','), ...rows].join('\n');
}

/** Export the statistics history as JSON Lines, one generation per line. */
export function exportStatisticsJSONL(this: OptimizerInternals): string {
  return this._statistics
    .map((record, generation) => JSON.stringify({ generation, ...record }))
    .join('\n');
}
