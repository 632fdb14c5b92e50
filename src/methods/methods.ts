/**
 * Genetic operators and their descriptor tables.
 */
export * from './crossover';
export * from './mutation';
export * from './meiosis';
export * from './selection';
