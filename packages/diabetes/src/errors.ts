/**
 * Error types raised by the analysis core
 */

/**
 * Malformed or out-of-range input. Raised before any computation runs.
 */
export class ValidationError extends Error {
  /** One entry per rejected field, e.g. `carbsGrams: must be >= 0` */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
