/**
 * httpline - Line-oriented HTTP/1.0 client
 *
 * Sends requests over caller-owned TCP connections, with an authority table
 * for credential scopes and RFC 822 header grammar helpers.
 */

export {
  HttpClient,
  parseStatusLine,
  formBody,
  plainTarget,
  targetWithReferer,
  resolveTarget,
  escapeTarget,
  HttpStatus,
  DEFAULT_PORT,
  DEFAULT_HTTP_VERSION,
  isSuccessStatus,
  type Target,
  type HttpStatusCode,
  type HttpResponse,
  type RequestHeaders,
  type FormFields,
  type HttpClientOptions,
} from './client/index.js';

export { AuthorityTable, scopeFromUrl, type AuthorityEntry, type AuthorityScope } from './auth/index.js';

export {
  token,
  quotedString,
  word,
  tokenList,
  parseAttrs,
  hexify,
  unhexify,
  urlEncode,
  HTML_PATTERN,
  type ParseResult,
  type HexPattern,
} from './grammar/index.js';

export { HeaderCollection, canonicalName, type LineSource, type AddOptions } from './headers/index.js';

export { parseUrl, type ParsedUrl } from './url/index.js';

export {
  Connection,
  readerFromMemory,
  readerFromGenerator,
  readAll,
  type BodyReader,
  type BodySource,
  type BufferGenerator,
  type ConnectionOptions,
  type Transport,
} from './transport/index.js';

export {
  decodedReader,
  decodeBase64,
  decodeQuotedPrintable,
  encodingName,
  isSupportedEncoding,
} from './mime/index.js';

export {
  getConfig,
  updateConfig,
  resetConfig,
  configFromEnv,
  defaultConfig,
  type HttpLineConfig,
} from './config/index.js';

export { createLogger, logger, LOG_PREFIX, type Logger } from './logger/index.js';
