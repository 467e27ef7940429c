/**
 * Transport Module
 *
 * @module transport
 */

export { Connection } from './connection.js';
export { readerFromMemory, readerFromGenerator, readAll } from './body.js';
export type {
  BodyReader,
  BodySource,
  BufferGenerator,
  ConnectionOptions,
  Transport,
} from './types.js';
