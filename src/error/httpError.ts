import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;
  /** Body text the service answered with, read before the error was raised */
  #body: string;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(
    response: Response,
    message: string = `HTTP Error: ${response.status}`,
    opts?: ErrorOptions & { body?: string },
  ) {
    super(message, opts);
    this.#response = response;
    this.#body = opts?.body ?? '';
  }

  /** Status code the service answered with */
  get status(): number {
    return this.#response.status;
  }

  /** Response causing the HTTPError; its body has usually been read into {@link HTTPError.body} */
  get response(): Response {
    return this.#response;
  }

  /** Body text the service answered with, empty when it could not be read */
  get body(): string {
    return this.#body;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
