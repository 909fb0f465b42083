/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export { FetchClient, type FetchClientOptions, type FetchRequestOptions } from './client.js';
export { joinUrl, mergeHeaderOptions } from './utils.js';
