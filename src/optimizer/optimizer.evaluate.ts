import type Genotype from '../genome/genotype';
import Multi from '../multithreading/multi';
import { warnOnce } from '../utils/warnings';
import type { OptimizerInternals } from './optimizer.types';

/**
 * Evaluate `population`: decode each individual, call the objective with the
 * decoded arguments and store the result as raw fitness. Scaled fitness starts
 * out equal to the raw fitness.
 *
 * With `parallel` the objective calls go through a bounded pool
 * (`Multi.workerCount`); results are assigned in population order once every
 * call has settled. Errors thrown by the decoder or the objective (and invalid
 * fitness values) abort the evaluation.
 */
export async function evaluate(
  this: OptimizerInternals,
  population: readonly Genotype[]
): Promise<void> {
  const { objective, decoder, parallel } = this._options;

  if (!parallel) {
    for (const individual of population) {
      const fitness = await objective(...decoder(individual));
      individual.fitness = fitness;
      individual.scaledFitness = fitness;
    }
    return;
  }

  const results = await Multi.map<Genotype, number>(
    population,
    Multi.workerCount(population.length),
    (individual) => {
      const outcome = objective(...decoder(individual));
      if (typeof outcome === 'number')
        warnOnce(
          'parallel-sync-objective',
          'Parallel evaluation requested with a synchronous objective; evaluations will not overlap'
        );
      return outcome;
    }
  );
  population.forEach((individual, i) => {
    individual.fitness = results[i];
    individual.scaledFitness = results[i];
  });
}
