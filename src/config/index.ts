/**
 * httpline Configuration
 * Central configuration for the HTTP client
 */

import { DEFAULT_HTTP_VERSION, DEFAULT_PORT } from '../client/status.js';

export interface HttpLineConfig {
  // Protocol settings
  defaultPort: number; // Port used when a URL or connection names none
  httpVersion: string; // Version token sent on the request line

  // Default request headers
  referer?: string; // Referer sent for plain targets instead of the target itself
  userAgent?: string; // Adds a User-Agent header when set

  // Diagnostics
  debug: boolean; // Log request lines and headers
}

/**
 * Environment variables consulted when building the defaults
 */
export const ENV_DEBUG = 'DEBUG_HTTP';
export const ENV_REFERER = 'HTTP_REFERER';

/**
 * Build configuration defaults from an environment
 *
 * @param env - Environment to read, process.env by default
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HttpLineConfig {
  const debug = env[ENV_DEBUG];
  const referer = env[ENV_REFERER];

  return {
    defaultPort: DEFAULT_PORT,
    httpVersion: DEFAULT_HTTP_VERSION,
    referer,
    debug: debug !== undefined && debug.length > 0,
  };
}

export const defaultConfig: HttpLineConfig = configFromEnv();

// Current active configuration (mutable for runtime changes)
let currentConfig: HttpLineConfig = { ...defaultConfig };

export function getConfig(): HttpLineConfig {
  return currentConfig;
}

export function updateConfig(partial: Partial<HttpLineConfig>): void {
  currentConfig = { ...currentConfig, ...partial };
}

export function resetConfig(): void {
  currentConfig = { ...defaultConfig };
}
