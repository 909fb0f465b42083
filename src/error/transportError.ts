import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when `fetch` itself fails before any response arrives
 * (DNS failure, refused or reset connection, TLS errors).
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  /** URL the request was sent to */
  #url: string;

  /** Creates a new instance of a TransportError for the URL that could not be reached */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** URL the request was sent to */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
