/**
 * Global allelic configuration contract & default instance.
 *
 * A central `config` object offers one documented surface for end-users (and
 * tests) to tweak library behaviour that is not tied to a single optimizer run.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'allelic-ts';
 *   config.warnings = true;                // emit runtime guidance
 *   config.maxEvaluationConcurrency = 4;   // cap the parallel evaluation pool
 *
 * Adjust BEFORE calling `run()` so the evaluation phase reads the intended values.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object, no setters / proxies.
 * - Optional flags are conservative by default (disabled).
 */
export interface AllelicConfig {
  /**
   * Emit advisory warnings (degenerate fitness scaling, synchronous objectives
   * under parallel evaluation, impossible fringe seeding) through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Upper bound for the number of objective evaluations in flight when an
   * optimizer runs with `parallel: true`. `undefined` = host parallelism
   * (`os.availableParallelism()`). Values below 1 are treated as 1.
   */
  maxEvaluationConcurrency?: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: AllelicConfig = {
  warnings: false, // emit runtime guidance
  // maxEvaluationConcurrency: 4, // example cap for the evaluation pool
};
