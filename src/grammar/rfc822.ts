/**
 * RFC 822 / HTTP Header Grammar
 *
 * Small parsers for the token, quoted-string and attribute-list productions
 * used in HTTP header values. Each parser consumes a prefix of its input and
 * returns the parsed value together with the unconsumed remainder, or
 * undefined when the production does not match at the current position so
 * callers can try another one.
 *
 * Reference: RFC 822 section 3.3, RFC 1945 section 2.2
 */

import type { ParseResult } from './types.js';

// =============================================================================
// Character Classes
// =============================================================================

/**
 * Characters that may appear in a token: anything but CTLs (0x00-0x1F, 0x7F),
 * tspecials and linear whitespace
 */
const TOKEN_CHARS = String.raw`[^\x00-\x1f\x7f()<>@,;:\\"/\[\]?={} \t]+`;

/** Quoted-string text: folded whitespace or any char but '"' and CTLs */
const QDTEXT = String.raw`(?:(?:\r?\n)?[ \t]+|[^"\x00-\x1f\x7f])`;

const TOKEN_RE = new RegExp(`^${TOKEN_CHARS}`);
const QUOTED_STRING_RE = new RegExp(`^"(${QDTEXT}*)"`);
const LEADING_WS_RE = /^\s*/;
const EQUALS_RE = /^\s*=\s*/;
const COMMA_RE = /^\s*,\s*/;

// attr=value where value is a token or a quoted span, optionally followed by ';'
const ATTRIBUTE_RE = new RegExp(
  String.raw`^\s*(${TOKEN_CHARS})\s*=\s*("[^"]*"|${TOKEN_CHARS})(\s*;)?`
);

function skipWhitespace(input: string): string {
  return input.replace(LEADING_WS_RE, '');
}

// =============================================================================
// Productions
// =============================================================================

/**
 * Match a token after optional leading whitespace
 *
 * @example token('GET /foo') // { value: 'GET', rest: ' /foo' }
 */
export function token(input: string): ParseResult<string> {
  const text = skipWhitespace(input);
  const match = TOKEN_RE.exec(text);
  if (!match) return undefined;

  return { value: match[0], rest: text.slice(match[0].length) };
}

/**
 * Match a double-quoted string after optional leading whitespace
 *
 * Folding sequences inside the quotes are returned as they appear.
 *
 * @param keepQuotes - Return the span with its surrounding quotes
 */
export function quotedString(input: string, keepQuotes = false): ParseResult<string> {
  const text = skipWhitespace(input);
  const match = QUOTED_STRING_RE.exec(text);
  if (!match) return undefined;

  return {
    value: keepQuotes ? match[0] : match[1],
    rest: text.slice(match[0].length),
  };
}

/**
 * Match a word: a token, or failing that a quoted string
 */
export function word(input: string, keepQuotes = false): ParseResult<string> {
  return token(input) ?? quotedString(input, keepQuotes);
}

/**
 * Parse a comma separated list of `token = quoted-string` pairs
 *
 * The result alternates keys and values. Parsing stops at the first pair
 * that does not match; the comma in front of it stays in `rest`.
 *
 * @example tokenList('a="1", b="2", c/d') // { value: ['a', '1', 'b', '2'], rest: ', c/d' }
 */
export function tokenList(input: string): { value: string[]; rest: string } {
  const list: string[] = [];
  let rest = input;

  for (;;) {
    let next = rest;
    if (list.length > 0) {
      const comma = COMMA_RE.exec(rest);
      if (!comma) break;
      next = rest.slice(comma[0].length);
    }

    const key = token(next);
    if (!key) break;
    const equals = EQUALS_RE.exec(key.rest);
    if (!equals) break;
    const value = quotedString(key.rest.slice(equals[0].length));
    if (!value) break;

    list.push(key.value, value.value);
    rest = value.rest;
  }

  return { value: list, rest };
}

/**
 * Parse `attr=value` pairs separated by optional semicolons, as found in
 * Content-Type and similar header parameters
 *
 * Attribute names are upper-cased and quotes are stripped from values.
 *
 * @param max - Stop after this many attributes
 * @example parseAttrs('charset="utf-8"; format=flowed') // { value: { CHARSET: 'utf-8', FORMAT: 'flowed' }, rest: '' }
 */
export function parseAttrs(
  input: string,
  max?: number
): { value: Record<string, string>; rest: string } {
  const attrs: Record<string, string> = {};
  let rest = input;
  let remaining = max ?? Infinity;

  while (remaining-- > 0) {
    const match = ATTRIBUTE_RE.exec(rest);
    if (!match) break;

    const [whole, attr, rawValue] = match;
    attrs[attr.toUpperCase()] = rawValue.replace(/^"(.*)"$/s, '$1');
    rest = rest.slice(whole.length);
  }

  return { value: attrs, rest };
}
