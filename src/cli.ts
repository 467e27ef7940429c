#!/usr/bin/env node
/**
 * httpline command line
 *
 * Usage: httpline <url> [--proxy host:port]
 *
 * Fetches one URL and prints the status line, the headers and the body.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { HttpClient } from './client/index.js';
import { Connection } from './transport/index.js';
import { parseUrl } from './url/index.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logger/index.js';

const log = createLogger('cli');

export const USAGE = 'usage: httpline <url> [--proxy host:port]';

export interface CliOptions {
  url: string;
  proxy?: { host: string; port: number };
}

export interface Output {
  write(chunk: string | Buffer): unknown;
}

function readArgs(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: { proxy: { type: 'string' } },
  });
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @returns The options, or an error message
 */
export function parseCliArgs(args: string[]): CliOptions | string {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(args);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }

  const [url, ...extra] = parsed.positionals;
  if (!url || extra.length > 0) {
    return USAGE;
  }

  const proxy = parsed.values.proxy;
  if (proxy === undefined) {
    return { url };
  }

  const match = /^([^:]+)(?::(\d+))?$/.exec(proxy);
  if (!match) {
    return `invalid proxy address: ${proxy}`;
  }
  const port = match[2] === undefined ? getConfig().defaultPort : Number(match[2]);
  return { url, proxy: { host: match[1], port } };
}

/**
 * Fetch the URL named on the command line
 *
 * @returns Process exit code
 */
export async function run(args: string[], out: Output = process.stdout): Promise<number> {
  const options = parseCliArgs(args);
  if (typeof options === 'string') {
    log.error(options);
    return 2;
  }

  const target = parseUrl(options.url);
  const host = options.proxy?.host ?? target.host;
  const port = options.proxy?.port ?? target.port;
  if (host === undefined) {
    log.error(`no host in ${options.url}; give an absolute URL or --proxy`);
    return 2;
  }

  const conn = await Connection.open(host, port, { proxy: options.proxy !== undefined });
  if (!conn) return 1;

  try {
    const response = await new HttpClient(conn).get(options.url);
    if (!response) return 1;

    out.write(`${response.version} ${response.code} ${response.text}\n`);
    for (const [name, value] of response.headers) {
      out.write(`${name}: ${value}\n`);
    }
    out.write('\n');

    const body = conn.bodyReader();
    for (;;) {
      const chunk = await body.read();
      if (chunk.length === 0) break;
      out.write(chunk);
    }
    return 0;
  } finally {
    conn.close();
  }
}

function isMainModule(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  );
}
