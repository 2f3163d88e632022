/**
 * Transport entrypoint: the default fetch-backed transport and header helpers.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './client.js';
export { mergeHeaderOptions } from './utils.js';
