/**
 * Grammar Module
 *
 * Header value parsers and percent-encoding helpers.
 *
 * @module grammar
 */

export { token, quotedString, word, tokenList, parseAttrs } from './rfc822.js';
export { hexify, unhexify, urlEncode, HTML_PATTERN } from './hexify.js';
export type { ParseResult, HexPattern } from './types.js';
