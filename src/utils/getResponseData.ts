import { DecodeError } from '../error/decodeError.js';
import type { JsonValue } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Safely extracts and parses the response body into a tuple-style result.
 *
 * Behavior:
 * - The body is read as text and parsed as JSON whatever the `Content-Type` says,
 *   since the service does not label every JSON answer.
 * - A failed body read returns `[DecodeError, null]` with the read error as `cause`.
 * - An empty body returns `[DecodeError, null]`; no endpoint answers with nothing on success.
 * - A body that is not JSON returns `[DecodeError, null]` with the `SyntaxError` as `cause`.
 *
 * @param response - The HTTP response to extract data from.
 * @returns A tuple `[error, value]` with the parsed body on success.
 */
export async function getResponseData(response: Response): SafeWrapAsync<DecodeError, JsonValue> {
  // Use .text as reader, since double reads with text -> json would cause TypeError
  // due to the body being consumed already
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new DecodeError('error reading response body', response.status, { cause: errText }), null];
  }

  if (!text.trim()) {
    return [new DecodeError('error empty response body', response.status), null];
  }

  const [errJson, json] = safeWrap((): JsonValue => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error parsing json response body', response.status, { cause: errJson }), null];
  }

  return [null, json];
}
