import { isErrorType } from './isErrorType.js';

/**
 * Error raised by status checks called without a job UUID.
 */
export class MissingIdentifierError extends Error {
  /** MissingIdentifierError error-name */
  static name = 'MissingIdentifierError';

  constructor(message = 'error no UUID provided for status check', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link MissingIdentifierError}.
 */
export function isMissingIdentifierError(error: unknown): error is MissingIdentifierError {
  return isErrorType(MissingIdentifierError, error);
}
