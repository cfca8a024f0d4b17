/**
 * HTTP module exports.
 *
 * @module http
 */

export type { HttpClient, HttpRequest, HttpResponse } from './types.js';
export { FetchTransport, type FetchTransportConfig } from './transport.js';
