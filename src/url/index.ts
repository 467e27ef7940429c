/**
 * URL Parsing
 *
 * Splits a request target into the fields the client needs. Absolute URLs
 * go through the WHATWG parser; anything else is treated as a local
 * reference (path and query) with no host.
 *
 * @module url
 */

import { URL } from 'node:url';
import { getConfig } from '../config/index.js';

export interface ParsedUrl {
  /** The target as given */
  href: string;
  /** Scheme without the colon, e.g. 'http' */
  scheme?: string;
  /** Lower-cased host name */
  host?: string;
  /** Host with the port when it is not the scheme default, for the Host header */
  authority?: string;
  port: number;
  /** Path component, at least '/' */
  path: string;
  /** Query including its leading '?', or '' */
  query: string;
  /** Path plus query, as sent on the request line to an origin server */
  localPart: string;
}

const SCHEME_PORTS: Record<string, number> = {
  http: 80,
  https: 443,
};

function parseAbsolute(target: string): URL | null {
  try {
    return new URL(target);
  } catch {
    return null;
  }
}

/**
 * Parse a request target
 *
 * @example parseUrl('http://a.test:8080/x?y=1').localPart // '/x?y=1'
 */
export function parseUrl(target: string): ParsedUrl {
  const url = parseAbsolute(target);

  if (url && url.hostname) {
    const scheme = url.protocol.replace(/:$/, '');
    const path = url.pathname || '/';
    return {
      href: target,
      scheme,
      host: url.hostname,
      authority: url.host,
      port: url.port ? Number(url.port) : SCHEME_PORTS[scheme] ?? getConfig().defaultPort,
      path,
      query: url.search,
      localPart: path + url.search,
    };
  }

  const withoutFragment = target.split('#')[0];
  const queryStart = withoutFragment.indexOf('?');
  const path = (queryStart < 0 ? withoutFragment : withoutFragment.slice(0, queryStart)) || '/';
  const query = queryStart < 0 ? '' : withoutFragment.slice(queryStart);

  return {
    href: target,
    port: getConfig().defaultPort,
    path,
    query,
    localPart: path + query,
  };
}
