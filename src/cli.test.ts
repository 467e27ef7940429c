import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import http from 'node:http';
import { parseCliArgs, run, USAGE } from './cli.js';

describe('parseCliArgs', () => {
  it('should take a single URL', () => {
    expect(parseCliArgs(['http://a.test/'])).toEqual({ url: 'http://a.test/' });
  });

  it('should read a proxy address', () => {
    expect(parseCliArgs(['http://a.test/', '--proxy', 'cache.test:3128'])).toEqual({
      url: 'http://a.test/',
      proxy: { host: 'cache.test', port: 3128 },
    });
  });

  it('should use the default port for a proxy without one', () => {
    expect(parseCliArgs(['--proxy=cache.test', 'http://a.test/'])).toEqual({
      url: 'http://a.test/',
      proxy: { host: 'cache.test', port: 80 },
    });
  });

  it('should reject a missing or extra URL', () => {
    expect(parseCliArgs([])).toBe(USAGE);
    expect(parseCliArgs(['http://a.test/', 'http://b.test/'])).toBe(USAGE);
  });

  it('should reject a malformed proxy address', () => {
    expect(parseCliArgs(['http://a.test/', '--proxy', 'host:port'])).toBe('invalid proxy address: host:port');
  });
});

describe('run', () => {
  let server: http.Server;
  let port: number;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end(`path=${req.url}`);
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
    vi.restoreAllMocks();
  });

  function capture(): { write(chunk: string | Buffer): void; text(): string } {
    const chunks: Buffer[] = [];
    return {
      write(chunk) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      },
      text: () => Buffer.concat(chunks).toString(),
    };
  }

  it('should print the status line, headers and body', async () => {
    const out = capture();
    expect(await run([`http://127.0.0.1:${port}/doc`], out)).toBe(0);
    const [head, body] = out.text().split('\n\n');
    const lines = head.split('\n');
    expect(lines[0]).toBe('HTTP/1.1 200 OK');
    expect(lines).toContain('Content-Type: text/plain');
    expect(body).toBe('path=/doc');
  });

  it('should send the full URL through a proxy', async () => {
    const out = capture();
    expect(await run(['http://origin.test/page', '--proxy', `127.0.0.1:${port}`], out)).toBe(0);
    expect(out.text().endsWith('\n\npath=http://origin.test/page')).toBe(true);
  });

  it('should fail with usage errors', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await run([], capture())).toBe(2);
    expect(error).toHaveBeenCalledWith(`[httpline][cli] ${USAGE}`);
  });

  it('should fail for a URL without a host', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await run(['/relative'], capture())).toBe(2);
  });
});
