import { isErrorType } from './isErrorType.js';

/**
 * Error raised by hash searches given a search type the service does not index.
 */
export class InvalidSearchKindError extends Error {
  /** InvalidSearchKindError error-name */
  static name = 'InvalidSearchKindError';
  /** The rejected search type */
  #searchType: unknown;

  constructor(searchType: unknown, opts?: ErrorOptions) {
    super(`error search type must be one of capa, exif; got ${JSON.stringify(searchType)}`, opts);
    this.#searchType = searchType;
  }

  /** The rejected search type, as given by the caller */
  get searchType(): unknown {
    return this.#searchType;
  }
}

/**
 * Type guard for {@link InvalidSearchKindError}.
 */
export function isInvalidSearchKindError(error: unknown): error is InvalidSearchKindError {
  return isErrorType(InvalidSearchKindError, error);
}
