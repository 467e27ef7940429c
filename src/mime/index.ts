/**
 * MIME Decoding
 *
 * Decodes a response body according to its Content-Transfer-Encoding.
 * Transfer encodings (base64, quoted-printable) and the common compression
 * names are supported; identity and unknown encodings pass through.
 *
 * @module mime
 */

import { gunzip, brotliDecompress, inflate } from 'node:zlib';
import { promisify } from 'node:util';
import { word } from '../grammar/index.js';
import { createLogger } from '../logger/index.js';
import { readAll, readerFromGenerator } from '../transport/body.js';
import type { BodyReader, BufferGenerator } from '../transport/types.js';

// Promisified zlib functions for non-blocking decompression
const gunzipAsync = promisify(gunzip);
const brotliDecompressAsync = promisify(brotliDecompress);
const inflateAsync = promisify(inflate);

const log = createLogger('mime');

type Decoder = (data: Buffer) => Promise<Buffer>;

/** Encodings whose data is already the content */
export const IDENTITY_ENCODINGS = new Set(['7bit', '8bit', 'binary', 'identity']);

const QP_SOFT_BREAK_RE = /=\r?\n/g;
const QP_ESCAPE_RE = /=([0-9A-Fa-f]{2})/g;

export function decodeBase64(data: Buffer): Buffer {
  // whitespace and line breaks are skipped by the decoder
  return Buffer.from(data.toString('latin1'), 'base64');
}

export function decodeQuotedPrintable(data: Buffer): Buffer {
  const text = data
    .toString('latin1')
    .replace(QP_SOFT_BREAK_RE, '')
    .replace(QP_ESCAPE_RE, (_match, hex: string) => String.fromCharCode(parseInt(hex, 16)));
  return Buffer.from(text, 'latin1');
}

function decompressWith(decompress: (data: Buffer) => Promise<Buffer>, name: string): Decoder {
  return async (data) => {
    try {
      return await decompress(data);
    } catch (err) {
      log.warn(`cannot ${name}-decode body, passing it through:`, err);
      return data;
    }
  };
}

const DECODERS = new Map<string, Decoder>([
  ['base64', async (data: Buffer) => decodeBase64(data)],
  ['quoted-printable', async (data: Buffer) => decodeQuotedPrintable(data)],
  ['gzip', decompressWith(gunzipAsync, 'gzip')],
  ['x-gzip', decompressWith(gunzipAsync, 'gzip')],
  ['deflate', decompressWith(inflateAsync, 'deflate')],
  ['br', decompressWith(brotliDecompressAsync, 'br')],
]);

/**
 * Encoding name from a Content-Transfer-Encoding header value, lower-cased
 *
 * @example encodingName(' Base64 ') // 'base64'
 */
export function encodingName(headerValue: string): string | undefined {
  return word(headerValue)?.value.toLowerCase();
}

export function isSupportedEncoding(encoding: string): boolean {
  const name = encodingName(encoding);
  return name !== undefined && (IDENTITY_ENCODINGS.has(name) || DECODERS.has(name));
}

async function* decodeAll(reader: BodyReader, decoder: Decoder): BufferGenerator {
  const decoded = await decoder(await readAll(reader));
  if (decoded.length > 0) {
    yield decoded;
  }
}

/**
 * Wrap a body reader so that it yields decoded data
 *
 * @param encoding - Content-Transfer-Encoding header value
 */
export function decodedReader(reader: BodyReader, encoding: string): BodyReader {
  const name = encodingName(encoding);
  if (name === undefined || IDENTITY_ENCODINGS.has(name)) {
    return reader;
  }

  const decoder = DECODERS.get(name);
  if (!decoder) {
    log.warn(`unsupported transfer encoding "${encoding}", passing data through`);
    return reader;
  }
  return readerFromGenerator(decodeAll(reader, decoder));
}
