/**
 * Authority Table
 *
 * Ordered list of protection scopes, each a (host, port, path-prefix)
 * triple with an optional Authorization value. Lookups pick the scope with
 * the longest path prefix that matches.
 *
 * @module auth
 */

import { parseUrl } from '../url/index.js';

export interface AuthorityEntry {
  /** Host name, compared exactly as stored */
  readonly host: string;
  readonly port: number;
  /** Literal prefix of the request paths this scope covers */
  readonly pathPrefix: string;
  /** Value for the Authorization header of requests in this scope */
  readonly authorization?: string;
}

export interface AuthorityScope {
  host: string;
  port: number;
  path: string;
}

export class AuthorityTable {
  private readonly list: AuthorityEntry[] = [];

  get size(): number {
    return this.list.length;
  }

  get entries(): readonly AuthorityEntry[] {
    return this.list;
  }

  /**
   * Append a scope. Entries are never deduplicated or removed.
   */
  addAuthority(host: string, port: number, pathPrefix: string, authorization?: string): AuthorityEntry {
    if (typeof host !== 'string' || typeof pathPrefix !== 'string') {
      throw new TypeError('host and pathPrefix must be strings');
    }
    if (!Number.isInteger(port)) {
      throw new TypeError(`port must be an integer, got ${String(port)}`);
    }

    const entry: AuthorityEntry = { host, port, pathPrefix, authorization };
    this.list.push(entry);
    return entry;
  }

  /**
   * Find the entry for a request: same host and port, and the longest
   * stored prefix of `path`. Among equal prefixes the first added wins.
   */
  findAuthority(host: string, port: number, path: string): AuthorityEntry | undefined {
    let best: AuthorityEntry | undefined;

    for (const entry of this.list) {
      if (
        entry.host === host &&
        entry.port === port &&
        path.startsWith(entry.pathPrefix) &&
        (!best || entry.pathPrefix.length > best.pathPrefix.length)
      ) {
        best = entry;
      }
    }

    return best;
  }
}

/**
 * Scope of an http URL, for looking it up in an authority table
 *
 * @returns undefined for URLs that are not plain http
 */
export function scopeFromUrl(target: string): AuthorityScope | undefined {
  const url = parseUrl(target);
  if (url.scheme !== 'http' || url.host === undefined) return undefined;

  return { host: url.host, port: url.port, path: url.path };
}
