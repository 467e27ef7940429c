/**
 * HTTP Client
 *
 * Sends one request over a caller-owned transport and reads back the
 * status line and headers. Everything is written before the response is
 * read; the transport is left open and positioned at the start of the body.
 *
 * Failures to get a usable status line are logged and reported as null.
 * Transport errors reject.
 */

import { getConfig } from '../config/index.js';
import { createLogger } from '../logger/index.js';
import { HeaderCollection } from '../headers/index.js';
import { token, urlEncode } from '../grammar/index.js';
import { parseUrl, type ParsedUrl } from '../url/index.js';
import { decodedReader } from '../mime/index.js';
import type { AuthorityTable } from '../auth/index.js';
import type { BodyReader, BodySource, Transport } from '../transport/types.js';
import { HttpStatus } from './status.js';
import { escapeTarget, resolveTarget, type Target } from './target.js';
import type { FormFields, HttpClientOptions, HttpResponse, RequestHeaders } from './types.js';

const log = createLogger('client');

// version, three-digit code, then the reason text
const STATUS_LINE_RE = /^(HTTP\/\d+\.\d+)\s+(\d{3})(?=\s|$)\s*/i;

/**
 * Parse a status line such as `HTTP/1.0 200 OK`
 *
 * @returns Version, code and text, or null when the line has another shape
 */
export function parseStatusLine(line: string): Pick<HttpResponse, 'version' | 'code' | 'status' | 'text'> | null {
  const match = STATUS_LINE_RE.exec(line);
  if (!match) return null;

  const [whole, version, code] = match;
  return {
    version,
    code,
    status: Number(code),
    text: line.slice(whole.length).trimEnd(),
  };
}

function isToken(value: string): boolean {
  const parsed = token(value);
  return parsed !== undefined && parsed.value === value && parsed.rest === '';
}

/**
 * Body lines for a form POST: `key=value` per field, values URL-encoded
 */
export function formBody(fields: FormFields): string[] {
  const entries = fields instanceof Map ? [...fields.entries()] : Object.entries(fields);
  return entries.map(([key, value]) => `${key}=${urlEncode(value)}\n`);
}

export class HttpClient {
  private readonly authorities?: AuthorityTable;

  constructor(
    private readonly transport: Transport,
    options: HttpClientOptions = {}
  ) {
    this.authorities = options.authorities;
  }

  /**
   * Send a request and read the response status line and headers
   *
   * @param method - Request method, upper-cased before sending
   * @param target - URI to request, optionally with the referring URI
   * @param headers - Headers that replace the generated ones of the same name
   * @param body - Chunks written after the headers
   * @param version - Version token, HTTP/1.0 unless configured otherwise
   * @returns The parsed response, or null if the server sent no usable status line
   */
  async request(
    method: string,
    target: Target | string,
    headers?: RequestHeaders,
    body?: BodySource,
    version: string = getConfig().httpVersion
  ): Promise<HttpResponse | null> {
    if (!method) {
      throw new TypeError('request method is required');
    }
    if (!isToken(method)) {
      throw new TypeError(`Invalid request method: ${JSON.stringify(method)}`);
    }
    if (target === undefined || target === null) {
      throw new TypeError('request target is required');
    }

    const verb = method.toUpperCase();
    const { uri: rawUri, referer } = resolveTarget(target);
    const uri = escapeTarget(rawUri);
    const url = parseUrl(uri);

    const requestHeaders = this.defaultHeaders(url, referer);
    if (headers) {
      requestHeaders.merge(headers instanceof HeaderCollection ? headers : HeaderCollection.from(headers));
    }

    const requestLine = `${verb} ${this.transport.proxy ? uri : url.localPart} ${version}`;
    log.debug(requestLine);
    log.debug('request headers:', requestHeaders.toRecord());

    try {
      // Supply request and headers
      this.transport.write(`${requestLine}\r\n`);
      this.transport.write(requestHeaders.serialize());

      // Supply data if present
      if (body) {
        for await (const chunk of body) {
          this.transport.write(chunk);
        }
      }
    } catch (err) {
      // nothing of a failed request may go out with the next one
      this.transport.discard();
      throw err;
    }

    await this.transport.flush();

    return this.readResponse();
  }

  get(target: Target | string): Promise<HttpResponse | null> {
    return this.request('GET', target);
  }

  /**
   * POST form fields, one `key=value` line each in insertion order
   */
  post(target: Target | string, fields: FormFields): Promise<HttpResponse | null> {
    const lines = formBody(fields);
    const length = lines.reduce((total, line) => total + Buffer.byteLength(line), 0);
    return this.request('POST', target, { 'Content-Length': String(length) }, lines);
  }

  /**
   * Send a request and return the response body when the status is 200
   *
   * The body is decoded when the response names a Content-Transfer-Encoding.
   *
   * @returns The body reader, or null for any other status or a failed request
   */
  async requestData(
    method: string,
    target: Target | string,
    headers?: RequestHeaders,
    body?: BodySource,
    version?: string
  ): Promise<BodyReader | null> {
    const response = await this.request(method, target, headers, body, version);
    if (!response || response.status !== HttpStatus.R_OK) {
      return null;
    }

    const reader = this.transport.bodyReader();
    const encoding = response.headers.get('Content-Transfer-Encoding');
    return encoding ? decodedReader(reader, encoding) : reader;
  }

  private defaultHeaders(url: ParsedUrl, referer: string): HeaderCollection {
    const headers = new HeaderCollection();
    headers.add('Accept', '*/*');
    headers.add('Referer', referer);
    if (url.authority !== undefined) {
      headers.add('Host', url.authority);
    }

    const userAgent = getConfig().userAgent;
    if (userAgent) {
      headers.add('User-Agent', userAgent);
    }

    const authorization = this.authorizationFor(url);
    if (authorization) {
      headers.add('Authorization', authorization);
    }
    return headers;
  }

  private authorizationFor(url: ParsedUrl): string | undefined {
    if (!this.authorities) return undefined;

    const host = url.host ?? this.transport.host;
    const port = url.host !== undefined ? url.port : this.transport.port ?? url.port;
    if (host === undefined) return undefined;

    return this.authorities.findAuthority(host, port, url.path)?.authorization;
  }

  private async readResponse(): Promise<HttpResponse | null> {
    const line = await this.transport.readLine();
    if (line === null || line === '') {
      log.warn('no response from HTTP server');
      return null;
    }

    const status = parseStatusLine(line);
    if (!status) {
      log.warn(`bad response from HTTP server: ${line}`);
      return null;
    }

    const headers = await HeaderCollection.readFrom(this.transport);
    return { ...status, headers };
  }
}
