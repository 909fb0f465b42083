import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import type { FetchLike, HeaderOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { joinUrl, mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * `fetch` implementation requests go through.
   * Defaults to the global `fetch`, looked up on every request.
   */
  fetch?: FetchLike;
}

/** Per-request options. */
export interface FetchRequestOptions {
  /** Serialized JSON or multipart form; omitted for header-only requests. */
  body?: string | FormData;
  /** Headers merged over the client defaults. */
  headers?: HeaderOptions;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default headers. */
  #headers: Headers;
  /** Injected fetch implementation, if any. */
  #fetch?: FetchLike;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts: FetchClientOptions = {}) {
    this.#baseUrl = baseUrl;
    this.#headers = mergeHeaderOptions(opts.headers);
    this.#fetch = opts.fetch;
  }

  /** Base URL prepended to all request paths. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Joins the base URL and a path into the absolute request URL. */
  url(path: string): string {
    return joinUrl(this.#baseUrl, path);
  }

  /**
   * Executes a POST request against the given path.
   *
   * @param path - Path relative to the base URL (e.g. `/api/traceix/v1/upload`).
   * @param opts - Body and headers merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  post(path: string, opts: FetchRequestOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('POST', path, opts);
  }

  /**
   * Core request implementation.
   *
   * Errors:
   * - `fetch` rejecting is wrapped in `TransportError`.
   * - Non-2xx responses are wrapped in `HTTPError`, with the body read as text.
   */
  async #request(method: string, path: string, opts: FetchRequestOptions): SafeWrapAsync<Error, Response> {
    const url = this.url(path);
    const send = this.#fetch ?? fetch;

    const [err, res] = await safeWrapAsync(() =>
      send(url, {
        method,
        headers: mergeHeaderOptions(this.#headers, opts.headers),
        ...(opts.body !== undefined && { body: opts.body }),
      }),
    );

    if (err) {
      return [new TransportError(`error calling ${method} ${url}`, url, { cause: err }), null];
    }

    if (!res.ok) {
      const [, body] = await safeWrapAsync(() => res.text());
      return [new HTTPError(res, `error in ${method} request to ${path}: ${res.status}`, { body: body ?? '' }), null];
    }

    return [null, res];
  }
}
