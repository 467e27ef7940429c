/**
 * Client Module
 *
 * @module client
 */

export { HttpClient, parseStatusLine, formBody } from './http-client.js';
export { plainTarget, targetWithReferer, resolveTarget, escapeTarget } from './target.js';
export type { Target } from './target.js';
export { HttpStatus, DEFAULT_PORT, DEFAULT_HTTP_VERSION, isSuccessStatus } from './status.js';
export type { HttpStatusCode } from './status.js';
export type { HttpResponse, RequestHeaders, FormFields, HttpClientOptions } from './types.js';
