/** Header options accepted by the fetch wrapper; a nullish value removes the header. */
export type HeaderOptions = Headers | [string, string][] | Record<string, string | null | undefined>;

/** Any value `JSON.parse` can produce. The service defines the shape per endpoint. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Signature of the `fetch` implementation the client sends requests through. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Body of a single request:
 * - `file` uploads the file at `path` as multipart form data,
 * - `json` serializes `body` with a JSON content type,
 * - `none` sends headers only.
 */
export type Payload =
  | { kind: 'file'; path: string }
  | { kind: 'json'; body: Record<string, string> }
  | { kind: 'none' };
