/**
 * Fetch entrypoint: exports the fetch transport and supporting types.
 * @module
 */
export { FetchClient, type FetchClientOptions } from './client.js';
export { headersToRecord, mergeHeaderOptions, transportErrorMessage } from './utils.js';
