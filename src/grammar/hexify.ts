/**
 * Percent-Encoding Helpers
 *
 * `hexify` escapes the characters matched by a pattern as `%xx`, `unhexify`
 * reverses any `%xx` sequence. Strings are handled as byte strings: a
 * character above 0xFF is escaped as its UTF-8 bytes.
 */

import type { HexPattern } from './types.js';

/** Everything outside printable ASCII, plus the double quote */
export const HTML_PATTERN = /[^!-~]|"/g;

const HEX_ESCAPE_RE = /%([0-9a-f]{2})/gi;

function toGlobal(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

function escapeChar(ch: string): string {
  const code = ch.charCodeAt(0);
  if (code <= 0xff) {
    return `%${code.toString(16).padStart(2, '0')}`;
  }
  let escaped = '';
  for (const byte of Buffer.from(ch, 'utf8')) {
    escaped += `%${byte.toString(16).padStart(2, '0')}`;
  }
  return escaped;
}

/**
 * Escape every character matched by a pattern as lower-case `%xx`
 *
 * @param pattern - Characters to escape, or 'HTML' for {@link HTML_PATTERN}
 * @example hexify('say "hi"', 'HTML') // 'say%20%22hi%22'
 */
export function hexify(str: string, pattern: HexPattern): string {
  const re = pattern === 'HTML' ? HTML_PATTERN : toGlobal(pattern);
  return str.replace(re, (match) => Array.from(match, escapeChar).join(''));
}

/**
 * Replace every `%xx` sequence with the character it encodes
 */
export function unhexify(str: string): string {
  return str.replace(HEX_ESCAPE_RE, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}

/**
 * Form-encode a value for a POST body line
 *
 * Only unreserved characters (A-Z a-z 0-9 - _ . ~) are left as they are.
 */
export function urlEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}
