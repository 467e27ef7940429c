/**
 * HTTP Protocol Constants
 *
 * Status codes the client knows by name, plus connection defaults.
 * Reference: RFC 1945 section 9
 */

/** Default port number for HTTP */
export const DEFAULT_PORT = 80;

/** Version token sent on the request line unless the caller names another */
export const DEFAULT_HTTP_VERSION = 'HTTP/1.0';

export const HttpStatus = {
  // Success
  /** Request fulfilled */
  R_OK: 200,
  /** Follows a POST; the text is the URI of the new document */
  R_CREATED: 201,
  /** Request accepted but not complete (may never be) */
  R_ACCEPTED: 202,
  /** Response is a private copy, not the original */
  R_PARTIAL: 203,
  /** Request fine but nothing to send back */
  R_NORESPONSE: 204,

  // Redirection
  /** Document has a new permanent URI */
  M_MOVED: 301,
  /** Document is currently elsewhere */
  M_FOUND: 302,
  /** Document needs a different method */
  M_METHOD: 303,
  /** Conditional GET: not modified, use the cached copy */
  M_NOT_MOD: 304,

  // Client errors
  E_BAD: 400,
  /** Bad authorisation; the text is the auth challenge */
  E_UNAUTH: 401,
  E_PAYMENT: 402,
  /** Request denied; authorisation won't help */
  E_FORBIDDEN: 403,
  E_NOT_FOUND: 404,

  // Server errors
  E_INTERNAL: 500,
  E_NOT_IMPL: 501,
  /** Load too high, try later */
  E_OVERLOAD: 502,
  /** Gateway timeout: subservices didn't respond in time */
  E_GTIMEOUT: 503,
} as const;

export type HttpStatusCode = (typeof HttpStatus)[keyof typeof HttpStatus];

/**
 * Check for a 2xx status
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
