/**
 * Client Types
 */

import type { HeaderCollection } from '../headers/index.js';
import type { AuthorityTable } from '../auth/index.js';

/**
 * Parsed response status line and headers
 */
export interface HttpResponse {
  /** Protocol version from the status line, e.g. 'HTTP/1.0' */
  version: string;
  /** Three-digit status code as sent */
  code: string;
  /** Status code as a number */
  status: number;
  /** Reason phrase, trailing whitespace removed */
  text: string;
  headers: HeaderCollection;
}

/**
 * Caller headers: a collection, or a plain name to value record
 */
export type RequestHeaders = HeaderCollection | Record<string, string | string[]>;

/**
 * Form fields for POST, sent in insertion order
 */
export type FormFields = Record<string, string> | Map<string, string>;

export interface HttpClientOptions {
  /** Scopes whose Authorization value is added to matching requests */
  authorities?: AuthorityTable;
}
