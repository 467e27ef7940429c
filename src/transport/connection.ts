/**
 * TCP Connection
 *
 * Promise-based wrapper around a net.Socket giving the client line reads,
 * buffered raw writes with an explicit flush, and the remaining input as a
 * body reader. The socket is kept paused and only resumed while a read is
 * waiting for data.
 */

import net from 'node:net';
import { getConfig } from '../config/index.js';
import { createLogger } from '../logger/index.js';
import type { BodyReader, ConnectionOptions, DynBuf, Transport } from './types.js';

const log = createLogger('transport');

function bufPush(buf: DynBuf, data: Buffer): void {
  const newLen = buf.length + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length, 32);
    while (cap < newLen) {
      cap *= 2;
    }
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0);
    buf.data = grown;
  }
  data.copy(buf.data, buf.length, 0);
  buf.length = newLen;
}

// remove and return the first `len` bytes
function bufShift(buf: DynBuf, len: number): Buffer {
  const head = Buffer.from(buf.data.subarray(0, len));
  buf.data.copyWithin(0, len, buf.length);
  buf.length -= len;
  return head;
}

export class Connection implements Transport {
  readonly host: string;
  readonly port: number;
  readonly proxy: boolean;

  private err: Error | null = null;
  private ended = false;
  private reader: null | {
    resolve: (value: Buffer) => void;
    reject: (reason: Error) => void;
  } = null;
  private readonly buf: DynBuf = { data: Buffer.alloc(0), length: 0 };
  private pending: Buffer[] = [];

  /**
   * Connect to host:port
   *
   * @returns The connection, or null when it cannot be established
   */
  static open(
    host: string,
    port: number = getConfig().defaultPort,
    options: ConnectionOptions = {}
  ): Promise<Connection | null> {
    return new Promise((resolve) => {
      const socket = net.connect({ host, port });
      const onError = (err: Error) => {
        log.warn(`cannot connect to ${host}:${port}: ${err.message}`);
        socket.destroy();
        resolve(null);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new Connection(socket, host, port, options));
      });
    });
  }

  /**
   * Wrap a socket that is already connected
   */
  static fromSocket(
    socket: net.Socket,
    host: string,
    port: number = getConfig().defaultPort,
    options: ConnectionOptions = {}
  ): Connection {
    return new Connection(socket, host, port, options);
  }

  private constructor(
    private readonly socket: net.Socket,
    host: string,
    port: number,
    options: ConnectionOptions
  ) {
    this.host = host.toLowerCase();
    this.port = port;
    this.proxy = options.proxy ?? false;

    socket.pause();
    socket.on('data', (data: Buffer) => {
      socket.pause();
      if (this.reader) {
        this.reader.resolve(data);
        this.reader = null;
      } else {
        bufPush(this.buf, data);
      }
    });
    socket.on('end', () => {
      this.ended = true;
      if (this.reader) {
        this.reader.resolve(Buffer.from(''));
        this.reader = null;
      }
    });
    socket.on('error', (err: Error) => {
      this.err = err;
      if (this.reader) {
        this.reader.reject(err);
        this.reader = null;
      } else {
        log.debug(`socket error on ${this.host}:${this.port}: ${err.message}`);
      }
    });
  }

  /**
   * Read one line without its terminator (LF or CRLF)
   *
   * @returns The line, or null at end of input before any byte of it
   */
  async readLine(): Promise<string | null> {
    for (;;) {
      const idx = this.buf.data.subarray(0, this.buf.length).indexOf('\n');
      if (idx >= 0) {
        const line = bufShift(this.buf, idx + 1).toString('latin1');
        return line.replace(/\r?\n$/, '');
      }

      const data = await this.soRead();
      if (data.length === 0) {
        if (this.buf.length === 0) {
          return null;
        }
        // last line without a terminator
        return bufShift(this.buf, this.buf.length).toString('latin1').replace(/\r$/, '');
      }
      bufPush(this.buf, data);
    }
  }

  /**
   * Queue data for sending; nothing goes out before flush()
   */
  write(data: Buffer | string): void {
    const chunk = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    if (chunk.length > 0) {
      this.pending.push(chunk);
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const data = Buffer.concat(this.pending);
    this.pending = [];
    await this.soWrite(data);
  }

  discard(): void {
    this.pending = [];
  }

  /**
   * The rest of the input, starting with anything already buffered
   */
  bodyReader(): BodyReader {
    return {
      length: -1,
      read: async (): Promise<Buffer> => {
        if (this.buf.length > 0) {
          return bufShift(this.buf, this.buf.length);
        }
        return await this.soRead();
      },
    };
  }

  close(): void {
    this.socket.destroy();
  }

  private soRead(): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (this.err) {
        reject(this.err);
        return;
      }
      if (this.ended) {
        resolve(Buffer.from(''));
        return;
      }
      this.reader = { resolve, reject };
      this.socket.resume();
    });
  }

  private soWrite(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.err) {
        reject(this.err);
        return;
      }
      this.socket.write(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
