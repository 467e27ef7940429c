/**
 * Grammar Types
 */

/**
 * Outcome of a grammar production: the parsed value and the unconsumed
 * input, or undefined when the production does not match
 */
export type ParseResult<T> = { value: T; rest: string } | undefined;

/**
 * Character pattern accepted by hexify: a regular expression, or the
 * 'HTML' alias for everything outside printable ASCII plus '"'
 */
export type HexPattern = RegExp | 'HTML';
