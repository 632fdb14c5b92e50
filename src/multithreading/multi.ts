import { availableParallelism } from 'os';
import { config } from '../config';

/**
 * Parallel evaluation utilities.
 *
 * Objective functions are arbitrary closures and cannot be shipped to a child
 * process, so parallel evaluation keeps every task on the main event loop and
 * bounds how many are in flight at once. Asynchronous objectives (I/O bound
 * simulations, remote services, their own worker threads) overlap; synchronous
 * ones simply run one after another.
 *
 * Results always come back in input order and every call is a full barrier:
 * `map` resolves only once all tasks have settled successfully.
 */
export default class Multi {
  /**
   * Size of the evaluation pool for `tasks` tasks:
   * min(host parallelism, `config.maxEvaluationConcurrency`, tasks), at least 1.
   */
  static workerCount(tasks: number): number {
    const host = availableParallelism();
    const cap = config.maxEvaluationConcurrency ?? host;
    return Math.max(1, Math.min(host, Math.floor(cap), tasks));
  }

  /**
   * Map `items` through `task` with at most `concurrency` tasks in flight.
   *
   * The first failure rejects the returned promise; tasks not yet started are
   * skipped and results of tasks still in flight are discarded.
   *
   * @example
   * const squares = await Multi.map([1, 2, 3], 2, async (x) => x * x); // [1, 4, 9]
   */
  static async map<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => R | Promise<R>
  ): Promise<R[]> {
    const results: R[] = [];
    let next = 0;
    let failed = false;

    const drain = async (): Promise<void> => {
      while (!failed && next < items.length) {
        const index = next++;
        try {
          results[index] = await task(items[index], index);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const lanes = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: lanes }, () => drain()));
    return results;
  }
}
