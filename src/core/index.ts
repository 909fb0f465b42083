/**
 * Core entrypoint: exports the Traceix client, its options and the endpoint map.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Client for the Traceix file-analysis service: one method per endpoint,
 * resolving `null` on late-stage failures, plus `call` for error-first tuples.
 */
export {
  classifyFailure,
  type FailureKind,
  type FullUploadResult,
  type HashSearchOptions,
  TraceixClient,
  type TraceixClientOptions,
} from './client.js';

/**
 * Paths and payload kinds of every service endpoint.
 */
export {
  type EndpointDefinition,
  type EndpointName,
  endpoints,
  isSearchKind,
  type PayloadFor,
  type SearchKind,
  searchEndpoints,
} from './endpoints.js';

/**
 * Client identifier and header builders.
 */
export { API_KEY_HEADER, buildHeaders, buildUserAgent, type PlatformInfo, USER_AGENT_HEADER } from './identity.js';
