/**
 * Transport Types
 */

import type { LineSource } from '../headers/index.js';

export type BufferGenerator = AsyncGenerator<Buffer, void, void>;

export type BodyReader = {
  // the 'Content-Length', -1 if unknown.
  length: number;
  // read data. returns an empty buffer after EOF
  read: () => Promise<Buffer>;
  // optional cleanups
  close?: () => Promise<void>;
};

/**
 * Request body: chunks written in order after the headers
 */
export type BodySource = Iterable<Buffer | string> | AsyncIterable<Buffer | string>;

/**
 * What the client needs from a connection: line reads, buffered raw
 * writes, an explicit flush, and the rest of the input as a body
 */
export interface Transport extends LineSource {
  /** Send absolute URIs on the request line */
  readonly proxy: boolean;
  /** Remote end, for requests whose target names no host */
  readonly host?: string;
  readonly port?: number;
  write(data: Buffer | string): void;
  flush(): Promise<void>;
  /** Drop everything written since the last flush */
  discard(): void;
  bodyReader(): BodyReader;
}

export interface ConnectionOptions {
  /** The remote end is an HTTP proxy */
  proxy?: boolean;
}

export type DynBuf = {
  data: Buffer;
  length: number;
};
