/**
 * Root entrypoint for the Traceix SDK: re-exports the client, configuration, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the Traceix file-analysis service, its options and failure classification.
 */
export {
  classifyFailure,
  type FailureKind,
  type FullUploadResult,
  type HashSearchOptions,
  TraceixClient,
  type TraceixClientOptions,
} from './core/client.js';

/**
 * Endpoint paths and the search indexes `hashSearch` accepts.
 */
export { type EndpointName, endpoints, type PayloadFor, type SearchKind, searchEndpoints } from './core/endpoints.js';

/**
 * Client identifier and header names.
 */
export { API_KEY_HEADER, buildUserAgent, type PlatformInfo, USER_AGENT_HEADER } from './core/identity.js';

/**
 * Configuration defaults, environment variable names and the resolver.
 */
export {
  API_KEY_ENV,
  type ClientConfig,
  type ConfigOptions,
  DEFAULT_BASE_URL,
  DISABLE_TELEMETRY_ENV,
  type Env,
  PRODUCT_NAME,
  resolveConfig,
  SDK_VERSION,
} from './config/config.js';

export * from './error/index.js';

export type { FetchLike, JsonValue, Payload } from './types/request.js';

/** Pluggable logger; `console` satisfies it. */
export { type Logger, silentLogger } from './utils/logger.js';

/** Error-first tuple types returned by {@link TraceixClient.call}. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
