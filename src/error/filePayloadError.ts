import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an upload file cannot be opened, read or closed.
 * The filesystem error is kept as `cause`.
 */
export class FilePayloadError extends Error {
  /** FilePayloadError error-name */
  static name = 'FilePayloadError';
  /** Path that failed to open or read */
  #path: string;

  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path that failed to open or read */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link FilePayloadError}.
 */
export function isFilePayloadError(error: unknown): error is FilePayloadError {
  return isErrorType(FilePayloadError, error);
}

/**
 * Extract a {@link FilePayloadError} from an unknown error value, following nested causes.
 */
export function getFilePayloadError(error: unknown): null | FilePayloadError {
  return unwrapErrorType(FilePayloadError, error);
}
