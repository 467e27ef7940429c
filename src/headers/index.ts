/**
 * Header Collection
 *
 * Ordered multi-map of RFC 822 style header fields. Names are matched
 * case-insensitively and stored in canonical form; values keep their
 * insertion order. Reading unfolds continuation lines, writing folds
 * embedded line breaks.
 *
 * @module headers
 */

import { token } from '../grammar/index.js';
import { createLogger } from '../logger/index.js';

const log = createLogger('headers');

/**
 * Anything that hands out one line at a time, null at end of input
 */
export interface LineSource {
  readLine(): Promise<string | null>;
}

export interface AddOptions {
  /** Replace every existing value of the same name */
  supersede?: boolean;
}

interface HeaderField {
  name: string;
  value: string;
}

const CONTINUATION_RE = /^[ \t]/;
const LINE_BREAK_RE = /(?:\r\n|\r|\n)[ \t]*/g;

/**
 * Canonical form of a header name: each dash-separated word capitalised
 *
 * @example canonicalName('content-TRANSFER-encoding') // 'Content-Transfer-Encoding'
 */
export function canonicalName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

function isValidName(name: string): boolean {
  const parsed = token(name);
  return parsed !== undefined && parsed.value === name && parsed.rest === '';
}

export class HeaderCollection implements Iterable<[string, string]> {
  private readonly fields: HeaderField[] = [];

  /**
   * Build a collection from a plain record; array values become repeated fields
   */
  static from(record: Record<string, string | string[] | undefined>): HeaderCollection {
    const headers = new HeaderCollection();
    for (const [name, value] of Object.entries(record)) {
      if (value === undefined) continue;
      for (const item of Array.isArray(value) ? value : [value]) {
        headers.add(name, item);
      }
    }
    return headers;
  }

  /**
   * Parse header lines, unfolding continuation lines into the field before them
   *
   * Parsing stops at the first empty line. Lines that are not `Name: value`
   * are skipped.
   */
  static parseLines(lines: Iterable<string>): HeaderCollection {
    const headers = new HeaderCollection();
    for (const line of lines) {
      if (line === '') break;
      headers.pushLine(line);
    }
    return headers;
  }

  /**
   * Read header lines from a line source up to the empty line or end of input
   */
  static async readFrom(source: LineSource): Promise<HeaderCollection> {
    const headers = new HeaderCollection();
    for (;;) {
      const line = await source.readLine();
      if (line === null || line === '') break;
      headers.pushLine(line);
    }
    return headers;
  }

  get size(): number {
    return this.fields.length;
  }

  /**
   * Append a value; existing values of the same name are kept unless
   * `supersede` is set
   */
  add(name: string, value: string, options: AddOptions = {}): this {
    if (options.supersede) {
      return this.supersede(name, value);
    }
    this.fields.push({ name: this.checkedName(name), value });
    return this;
  }

  /**
   * Replace all values of a name with one value, at the position of the
   * first existing one (or at the end)
   */
  supersede(name: string, value: string): this {
    const canonical = this.checkedName(name);
    const first = this.fields.findIndex((field) => field.name === canonical);
    if (first < 0) {
      this.fields.push({ name: canonical, value });
      return this;
    }
    this.removeAll(canonical);
    this.fields.splice(first, 0, { name: canonical, value });
    return this;
  }

  get(name: string): string | undefined {
    const canonical = canonicalName(name);
    return this.fields.find((field) => field.name === canonical)?.value;
  }

  getAll(name: string): string[] {
    const canonical = canonicalName(name);
    return this.fields.filter((field) => field.name === canonical).map((field) => field.value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  delete(name: string): boolean {
    return this.removeAll(canonicalName(name)) > 0;
  }

  /** Distinct names in order of first appearance */
  names(): string[] {
    return [...new Set(this.fields.map((field) => field.name))];
  }

  entries(): Array<[string, string]> {
    return this.fields.map((field) => [field.name, field.value]);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries()[Symbol.iterator]();
  }

  /**
   * Merge another collection in; its values win over ours for every name it has
   */
  merge(other: HeaderCollection): this {
    for (const name of other.names()) {
      const [first, ...more] = other.getAll(name);
      this.supersede(name, first);
      for (const value of more) {
        this.add(name, value);
      }
    }
    return this;
  }

  /**
   * Serialize as a header block: one `Name: value` line per field, then the
   * empty line. Line breaks inside values are written as folded lines.
   */
  serialize(): string {
    let block = '';
    for (const { name, value } of this.fields) {
      block += `${name}: ${value.replace(LINE_BREAK_RE, '\r\n\t')}\r\n`;
    }
    return `${block}\r\n`;
  }

  /** Plain record view; repeated fields are comma-joined */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const name of this.names()) {
      record[name] = this.getAll(name).join(', ');
    }
    return record;
  }

  private pushLine(line: string): void {
    if (CONTINUATION_RE.test(line)) {
      const last = this.fields[this.fields.length - 1];
      if (last) {
        const folded = line.trim();
        last.value = last.value === '' ? folded : `${last.value} ${folded}`;
      } else {
        log.debug(`continuation line without a header: ${line}`);
      }
      return;
    }

    const colon = line.indexOf(':');
    const name = colon > 0 ? line.slice(0, colon).trim() : '';
    if (!isValidName(name)) {
      log.debug(`ignoring malformed header line: ${line}`);
      return;
    }
    this.fields.push({ name: canonicalName(name), value: line.slice(colon + 1).trim() });
  }

  private checkedName(name: string): string {
    if (!isValidName(name)) {
      throw new TypeError(`Invalid header name: ${JSON.stringify(name)}`);
    }
    return canonicalName(name);
  }

  private removeAll(canonical: string): number {
    let removed = 0;
    for (let i = this.fields.length - 1; i >= 0; i--) {
      if (this.fields[i].name === canonical) {
        this.fields.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }
}
