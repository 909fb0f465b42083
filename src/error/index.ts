/**
 * Error entrypoint: exports the SDK's error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error raised when a successful response has an empty or non-JSON body. */
/** Extract a {@link DecodeError} from an unknown error value, following nested causes. */
/** Type guard for {@link DecodeError}. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error raised when a file cannot be opened or read for upload. */
/** Extract a {@link FilePayloadError} from an unknown error value, following nested causes. */
/** Type guard for {@link FilePayloadError}. */
export { FilePayloadError, getFilePayloadError, isFilePayloadError } from './filePayloadError.js';
/** Extracts an {@link HTTPError} from an unknown error value. */
/** Error representing a non-2xx HTTP response. */
/** Type guard that checks if an error is an {@link HTTPError}. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Error raised by hash searches given an unknown search type. */
/** Type guard for {@link InvalidSearchKindError}. */
export { InvalidSearchKindError, isInvalidSearchKindError } from './invalidSearchKindError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when no API key is available at construction. */
/** Type guard for {@link MissingCredentialError}. */
export { isMissingCredentialError, MissingCredentialError } from './missingCredentialError.js';
/** Error raised by status checks called without a UUID. */
/** Type guard for {@link MissingIdentifierError}. */
export { isMissingIdentifierError, MissingIdentifierError } from './missingIdentifierError.js';
/** Error raised when `fetch` fails before a response arrives. */
/** Extract a {@link TransportError} from an unknown error value, following nested causes. */
/** Type guard for {@link TransportError}. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when configuration fails schema validation. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
