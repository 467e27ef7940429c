/**
 * Request Targets
 *
 * A target is the URI to request, optionally paired with the URI of the
 * page it was reached from (sent as the Referer).
 */

import { getConfig } from '../config/index.js';

export type Target =
  | { kind: 'plain'; uri: string }
  | { kind: 'withReferer'; uri: string; referer: string };

export function plainTarget(uri: string): Target {
  return { kind: 'plain', uri };
}

export function targetWithReferer(uri: string, referer: string): Target {
  return { kind: 'withReferer', uri, referer };
}

/**
 * Resolve the URI and referer of a target
 *
 * A plain target is referred by the configured referer (HTTP_REFERER) when
 * there is one, otherwise by itself.
 */
export function resolveTarget(target: Target | string): { uri: string; referer: string } {
  const resolved = typeof target === 'string' ? plainTarget(target) : target;

  switch (resolved.kind) {
    case 'withReferer':
      return { uri: resolved.uri, referer: resolved.referer };
    case 'plain':
      return { uri: resolved.uri, referer: getConfig().referer ?? resolved.uri };
  }
}

/**
 * Escape the whitespace that cannot go on a request line
 *
 * Only spaces and tabs are escaped; everything else is sent as given.
 */
export function escapeTarget(uri: string): string {
  return uri.replace(/ /g, '%20').replace(/\t/g, '%09');
}
