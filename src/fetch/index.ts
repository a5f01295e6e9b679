/**
 * Fetch entrypoint: exports the fetch transport and its helpers.
 * @module
 */
export { FetchService } from './client.js';
export { mergeHeaderOptions } from './utils.js';
