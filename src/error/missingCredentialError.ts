import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a client is constructed without an API key, neither passed
 * explicitly nor found in the environment. The client is never created.
 */
export class MissingCredentialError extends Error {
  /** MissingCredentialError error-name */
  static name = 'MissingCredentialError';

  constructor(message = 'error no API key provided', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link MissingCredentialError}.
 */
export function isMissingCredentialError(error: unknown): error is MissingCredentialError {
  return isErrorType(MissingCredentialError, error);
}
