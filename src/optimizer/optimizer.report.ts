import type { OptimizerInternals } from './optimizer.types';

/**
 * Multi-line report of the optimizer parameters and the current population.
 *
 * Sections: problem parameters, GA parameters, float mutation parameters
 * (continuous genomes only), generation count, population, decoded phenotypes
 * (discrete non-permutation genomes only), fitness values and the latest
 * statistics record.
 */
export function describe(this: OptimizerInternals): string {
  const options = this._options;
  const population = this._population;
  const lines: string[] = [
    'Problem-specific parameters:',
    `numberChromosomes: ${options.numberChromosomes}, chromosomeLengths: [${options.chromosomeLengths.join(', ')}]`,
    '',
    'GA-specific parameters:',
    `populationSize: ${this._populationSize}, populationGrowth: ${this.populationGrowth}, overpopulation: ${this.overpopulation}`,
    `chromosomeSets: ${options.ploidy}, pCrossover: ${this.pCrossover}, pMutation: ${this.pMutation}, pInversion: ${this.pInversion}, fitnessScale: ${this.fitnessScale}`,
    `monogamous: ${options.monogamous}, numberChildren: ${options.numberChildren}`,
    `parallel: ${options.parallel}`,
  ];

  if (options.encoding.kind === 'continuous') {
    lines.push(
      '',
      'Parameters for floating point chromosomes:',
      `floatSigma: ${this.floatSigma}, floatSigmaAdapt: ${this.floatSigmaAdapt}`
    );
  }

  lines.push(
    '',
    `Number of generations computed: ${this.generation}`,
    '',
    'Current population:',
    population.map((individual) => individual.toString()).join('; ')
  );

  if (options.encoding.kind === 'discrete') {
    lines.push(
      'Decoded:',
      population.map((individual) => JSON.stringify(options.decoder(individual))).join('; ')
    );
  }

  const latest = this._statistics[this._statistics.length - 1];
  lines.push(
    'Fitness:',
    population.map((individual) => String(individual.fitness ?? 'n/a')).join('; '),
    '',
    'Current statistics:',
    latest ? JSON.stringify(latest) : 'none'
  );
  return lines.join('\n');
}
