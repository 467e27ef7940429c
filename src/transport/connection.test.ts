/**
 * Connection Integration Tests
 *
 * Uses a real TCP server on the loopback interface.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import net from 'node:net';
import { Connection } from './connection.js';
import { readAll } from './body.js';

let server: net.Server;
let port: number;
// what each accepted socket should do
let onClient: (socket: net.Socket) => void = (socket) => socket.end();
const opened: Connection[] = [];

async function connect(): Promise<Connection> {
  const conn = await Connection.open('127.0.0.1', port);
  if (!conn) throw new Error('test server unreachable');
  opened.push(conn);
  return conn;
}

beforeAll(async () => {
  server = net.createServer((socket) => {
    socket.on('error', () => socket.destroy());
    onClient(socket);
  });
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      port = typeof addr === 'object' && addr ? addr.port : 0;
      resolve();
    });
  });
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

afterEach(() => {
  for (const conn of opened.splice(0)) {
    conn.close();
  }
  vi.restoreAllMocks();
});

describe('Connection.open', () => {
  it('should record host, port and proxy flag', async () => {
    const conn = await Connection.open('127.0.0.1', port, { proxy: true });
    expect(conn).not.toBeNull();
    if (conn) opened.push(conn);
    expect(conn?.host).toBe('127.0.0.1');
    expect(conn?.port).toBe(port);
    expect(conn?.proxy).toBe(true);
  });

  it('should default to non-proxy mode', async () => {
    const conn = await connect();
    expect(conn.proxy).toBe(false);
  });

  it('should resolve to null when nothing listens', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    // grab a free port, then release it
    const closed = net.createServer();
    let freePort = 0;
    await new Promise<void>((resolve) => {
      closed.listen(0, '127.0.0.1', () => {
        const addr = closed.address();
        freePort = typeof addr === 'object' && addr ? addr.port : 0;
        resolve();
      });
    });
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const conn = await Connection.open('127.0.0.1', freePort);
    expect(conn).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('Connection.readLine', () => {
  it('should split CRLF and LF terminated lines', async () => {
    onClient = (socket) => socket.end('first\r\nsecond\nthird\r\n');
    const conn = await connect();
    expect(await conn.readLine()).toBe('first');
    expect(await conn.readLine()).toBe('second');
    expect(await conn.readLine()).toBe('third');
    expect(await conn.readLine()).toBeNull();
  });

  it('should return an unterminated last line', async () => {
    onClient = (socket) => socket.end('only line');
    const conn = await connect();
    expect(await conn.readLine()).toBe('only line');
    expect(await conn.readLine()).toBeNull();
  });

  it('should join a line delivered in several packets', async () => {
    onClient = (socket) => {
      socket.write('HTTP/1.0 2');
      setTimeout(() => socket.end('00 OK\r\n'), 20);
    };
    const conn = await connect();
    expect(await conn.readLine()).toBe('HTTP/1.0 200 OK');
  });

  it('should return an empty string for an empty line', async () => {
    onClient = (socket) => socket.end('\r\nafter\r\n');
    const conn = await connect();
    expect(await conn.readLine()).toBe('');
    expect(await conn.readLine()).toBe('after');
  });

  it('should return null at once when the peer closes without data', async () => {
    onClient = (socket) => socket.end();
    const conn = await connect();
    expect(await conn.readLine()).toBeNull();
  });
});

describe('Connection.write and flush', () => {
  it('should hold writes until flush', async () => {
    const received: Buffer[] = [];
    let gotData: () => void = () => {};
    const dataArrived = new Promise<void>((resolve) => {
      gotData = resolve;
    });
    onClient = (socket) => {
      socket.on('data', (chunk: Buffer) => {
        received.push(chunk);
        gotData();
      });
    };

    const conn = await connect();
    conn.write('GET / HTTP/1.0\r\n');
    conn.write(Buffer.from('\r\n'));
    conn.write('');
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(received).toHaveLength(0);

    await conn.flush();
    await dataArrived;
    expect(Buffer.concat(received).toString()).toBe('GET / HTTP/1.0\r\n\r\n');
  });

  it('should drop discarded writes', async () => {
    const received: Buffer[] = [];
    let gotData: () => void = () => {};
    const dataArrived = new Promise<void>((resolve) => {
      gotData = resolve;
    });
    onClient = (socket) => {
      socket.on('data', (chunk: Buffer) => {
        received.push(chunk);
        gotData();
      });
    };

    const conn = await connect();
    conn.write('abandoned\r\n');
    conn.discard();
    conn.write('kept\r\n');
    await conn.flush();
    await dataArrived;
    expect(Buffer.concat(received).toString()).toBe('kept\r\n');
  });

  it('should do nothing when flushing without pending data', async () => {
    onClient = () => {};
    const conn = await connect();
    await expect(conn.flush()).resolves.toBeUndefined();
  });
});

describe('Connection.bodyReader', () => {
  it('should return buffered bytes first and then the rest of the stream', async () => {
    onClient = (socket) => {
      socket.write('Status\r\nbody-start ');
      setTimeout(() => socket.end('body-end'), 20);
    };
    const conn = await connect();
    expect(await conn.readLine()).toBe('Status');
    const body = await readAll(conn.bodyReader());
    expect(body.toString()).toBe('body-start body-end');
  });

  it('should report an unknown length', async () => {
    onClient = (socket) => socket.end();
    const conn = await connect();
    expect(conn.bodyReader().length).toBe(-1);
  });
});

describe('Connection.fromSocket', () => {
  it('should wrap an already connected socket and lower-case the host', async () => {
    onClient = (socket) => socket.end('hello\n');
    const socket = net.connect({ host: '127.0.0.1', port });
    await new Promise<void>((resolve) => socket.once('connect', () => resolve()));
    const conn = Connection.fromSocket(socket, 'LOCALHOST', port);
    opened.push(conn);
    expect(conn.host).toBe('localhost');
    expect(await conn.readLine()).toBe('hello');
  });
});
