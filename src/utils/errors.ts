/**
 * Error taxonomy of the optimizer.
 *
 * Every error raised by the engine is fatal at the point it is thrown: it
 * signals a programmer or configuration mistake, never a transient condition,
 * so there is no retry policy anywhere in the library.
 */
export class OptimizerError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'OptimizerError';
  }
}

/** Raised at construction when the options describe an impossible setup. */
export class ConfigurationError extends OptimizerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by the fitness setters when the objective function (or the scaling
 * step) produced a value that is not a finite number greater than or equal to 0.
 */
export class InvalidFitnessError extends OptimizerError {
  constructor(message: string, public readonly value: unknown) {
    super(message, 'INVALID_FITNESS');
    this.name = 'InvalidFitnessError';
  }
}

/**
 * Raised by the generic decoder for genotypes it cannot interpret; the caller
 * must supply a custom decoder in that case.
 */
export class UnsupportedEncodingError extends OptimizerError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_ENCODING');
    this.name = 'UnsupportedEncodingError';
  }
}
