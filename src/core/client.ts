import { type ClientConfig, type ConfigOptions, type Env, resolveConfig } from '../config/config.js';
import { isDecodeError } from '../error/decodeError.js';
import { isHttpError } from '../error/httpError.js';
import { InvalidSearchKindError } from '../error/invalidSearchKindError.js';
import { MissingIdentifierError } from '../error/missingIdentifierError.js';
import { isTransportError } from '../error/transportError.js';
import { FetchClient, type FetchRequestOptions } from '../fetch/client.js';
import { jsonPayload, withFilePayload } from '../payload/payload.js';
import type { FetchLike, JsonValue, Payload } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { describeErrorChain, type Logger, silentLogger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import {
  type EndpointName,
  endpoints,
  isSearchKind,
  type PayloadFor,
  type SearchKind,
  searchEndpoints,
} from './endpoints.js';
import { buildHeaders, buildUserAgent } from './identity.js';

/** Constructor options accepted by {@link TraceixClient}, extends {@link ConfigOptions}. */
export interface TraceixClientOptions extends ConfigOptions {
  /**
   * Environment the API key and telemetry opt-out fall back to.
   * @default process.env
   */
  env?: Env;
  /** `fetch` implementation requests go through. Defaults to the global `fetch`. */
  fetch?: FetchLike;
  /** Receives request and failure logs. Defaults to a silent logger. */
  logger?: Logger;
}

/** Options for {@link TraceixClient.hashSearch}. */
export interface HashSearchOptions {
  /**
   * Index to search.
   * @default 'capa'
   */
  searchType?: SearchKind;
}

/** Results of {@link TraceixClient.fullUpload}: prediction, capabilities, metadata. */
export type FullUploadResult = [prediction: JsonValue | null, capabilities: JsonValue | null, metadata: JsonValue | null];

/** Kind of late-stage failure a request ended in. */
export type FailureKind = 'transport' | 'http' | 'decode' | 'unknown';

/**
 * Classifies a failed {@link TraceixClient.call} result by the error found in its cause chain.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (isTransportError(error)) {
    return 'transport';
  }

  if (isHttpError(error)) {
    return 'http';
  }

  if (isDecodeError(error)) {
    return 'decode';
  }

  return 'unknown';
}

/**
 * Client for the Traceix file-analysis service.
 *
 * Every operation validates its arguments, issues one POST and resolves with the decoded
 * JSON body. Transport failures, non-2xx answers and undecodable bodies resolve to `null`
 * and are logged as warnings; use {@link TraceixClient.call} to keep the error instead.
 *
 * Argument errors ({@link MissingIdentifierError}, {@link InvalidSearchKindError}) and
 * unreadable files ({@link FilePayloadError}) reject before anything is sent.
 *
 * @example
 * const client = new TraceixClient({ apiKey: 'test-key' });
 * const [prediction, capabilities, metadata] = await client.fullUpload('./sample.exe');
 */
export class TraceixClient {
  /** Resolved configuration. */
  #config: ClientConfig;
  /** Identifier sent as `user-agent`. */
  #userAgent: string;
  /** Transport with the credential and identifier headers applied. */
  #fetchClient: FetchClient;
  #logger: Logger;

  /**
   * @throws {MissingCredentialError} when no API key is passed and none is set in the environment.
   * @throws {ValidationError} when `baseUrl` is not an absolute http(s) URL.
   */
  constructor({ env = process.env, fetch, logger = silentLogger, ...configOpts }: TraceixClientOptions = {}) {
    this.#config = resolveConfig(configOpts, env);
    this.#userAgent = buildUserAgent(this.#config);
    this.#logger = logger;
    this.#fetchClient = new FetchClient(this.#config.baseUrl, {
      headers: buildHeaders(this.#config, this.#userAgent),
      fetch,
    });
  }

  /** Resolved, frozen configuration. */
  get config(): ClientConfig {
    return this.#config;
  }

  /** Address every endpoint path is joined onto. */
  get baseUrl(): string {
    return this.#fetchClient.baseUrl;
  }

  /** Identifier sent as `user-agent` with every request. */
  get userAgent(): string {
    return this.#userAgent;
  }

  /**
   * Sends a prediction request for the file at `path`.
   */
  aiPrediction(path: string): Promise<JsonValue | null> {
    return this.#settle('aiPrediction', 'upload', { kind: 'file', path });
  }

  /**
   * Checks the status of a previously submitted job.
   *
   * @throws {MissingIdentifierError} when `uuid` is missing or empty.
   */
  async checkStatus(uuid?: string | null): Promise<JsonValue | null> {
    if (!uuid) {
      throw new MissingIdentifierError();
    }

    return this.#settle('checkStatus', 'status', { kind: 'json', body: { uuid } });
  }

  /**
   * Looks up previously extracted capabilities (`capa`) or metadata (`exif`) by SHA-256.
   *
   * @throws {InvalidSearchKindError} when `searchType` is neither `capa` nor `exif`.
   */
  async hashSearch(sha256: string, { searchType = 'capa' }: HashSearchOptions = {}): Promise<JsonValue | null> {
    if (!isSearchKind(searchType)) {
      throw new InvalidSearchKindError(searchType);
    }

    return this.#settle('hashSearch', searchEndpoints[searchType], { kind: 'json', body: { sha256 } });
  }

  /**
   * Extracts the capabilities of the file at `path`.
   */
  capaExtraction(path: string): Promise<JsonValue | null> {
    return this.#settle('capaExtraction', 'capa', { kind: 'file', path });
  }

  /**
   * Extracts the EXIF metadata of the file at `path`.
   */
  exifExtraction(path: string): Promise<JsonValue | null> {
    return this.#settle('exifExtraction', 'exif', { kind: 'file', path });
  }

  /**
   * Runs prediction, capability extraction and metadata extraction on one file, one after another.
   */
  async fullUpload(path: string): Promise<FullUploadResult> {
    const prediction = await this.aiPrediction(path);
    const capabilities = await this.capaExtraction(path);
    const metadata = await this.exifExtraction(path);

    return [prediction, capabilities, metadata];
  }

  /**
   * Lists every dataset published to IPFS. The endpoint is public; the API key is still sent.
   */
  listAllIpfsDatasets(): Promise<JsonValue | null> {
    return this.#settle('listAllIpfsDatasets', 'ipfsList', { kind: 'none' });
  }

  /**
   * Fetches a published dataset by its IPFS content id.
   */
  getPublicIpfsDataset(cid: string): Promise<JsonValue | null> {
    return this.#settle('getPublicIpfsDataset', 'ipfsSearch', { kind: 'json', body: { cid } });
  }

  /**
   * Finds the published dataset a file hash belongs to, if any.
   */
  searchIpfsDatasetByHash(sha256: string): Promise<JsonValue | null> {
    return this.#settle('searchIpfsDatasetByHash', 'ipfsFind', { kind: 'json', body: { sha_hash: sha256 } });
  }

  /**
   * Performs one request against an endpoint and keeps the failure instead of collapsing it.
   *
   * The error, when present, wraps a {@link TransportError}, {@link HTTPError} or
   * {@link DecodeError}; see {@link classifyFailure}.
   *
   * @throws {FilePayloadError} when a file payload cannot be read.
   * @returns A promise resolving to `[error, data]`.
   */
  async call<Endpoint extends EndpointName>(
    endpoint: Endpoint,
    payload: PayloadFor<Endpoint>,
  ): SafeWrapAsync<Error, JsonValue> {
    const { path } = endpoints[endpoint];
    const body: Payload = payload;

    this.#logger.debug('sending request', { endpoint, method: 'POST', path, payload: body.kind });

    switch (body.kind) {
      case 'file':
        return withFilePayload(body.path, (form) => this.#send(endpoint, { body: form }), {
          onCloseError: (err) => {
            this.#logger.warn('error closing upload file', { endpoint, path: body.path, causes: describeErrorChain(err) });
          },
        });
      case 'json':
        return this.#send(endpoint, jsonPayload(body.body));
      case 'none':
        return this.#send(endpoint);
    }
  }

  /**
   * POSTs to the endpoint and decodes the JSON answer.
   */
  async #send(endpoint: EndpointName, opts?: FetchRequestOptions): SafeWrapAsync<Error, JsonValue> {
    const [errReq, response] = await this.#fetchClient.post(endpoints[endpoint].path, opts);
    if (errReq) {
      return [new Error(`error doing request to ${endpoint}`, { cause: errReq }), null];
    }

    const [errData, data] = await getResponseData(response);
    if (errData) {
      return [new Error(`error getting response from ${endpoint}`, { cause: errData }), null];
    }

    return [null, data];
  }

  /**
   * Runs {@link TraceixClient.call} and maps any failure to `null`, logging its cause chain.
   */
  async #settle<Endpoint extends EndpointName>(
    operation: string,
    endpoint: Endpoint,
    payload: PayloadFor<Endpoint>,
  ): Promise<JsonValue | null> {
    const [err, data] = await this.call(endpoint, payload);
    if (err) {
      this.#logger.warn(`${operation} failed, resolving null`, {
        operation,
        path: endpoints[endpoint].path,
        kind: classifyFailure(err),
        causes: describeErrorChain(err),
      });
      return null;
    }

    return data;
  }
}
