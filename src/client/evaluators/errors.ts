/**
 * Base class for evaluator errors
 */
export class EvaluatorError extends Error {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'EvaluatorError';
    this.cause = cause;
  }
}

/**
 * Indicates invalid evaluator construction options
 */
export class EvaluatorConfigError extends EvaluatorError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'EvaluatorConfigError';
  }
}

/**
 * Indicates that no format in the catalog has the requested height
 */
export class FormatNotFoundError extends EvaluatorError {
  public readonly height: number;

  constructor(height: number) {
    super(`No format with height ${height}`);
    this.name = 'FormatNotFoundError';
    this.height = height;
  }
}

/**
 * Indicates an evaluator or session used outside its active period
 */
export class EvaluatorStateError extends EvaluatorError {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluatorStateError';
  }
}
