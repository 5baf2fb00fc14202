export { Requestor, type RequestorOptions } from './client.js';
export { buildUrl, encodeBody, mergeHeaderOptions } from './utils.js';
