/**
 * Logger Module
 *
 * Prefixed console logging for the HTTP client. Debug output is only
 * written while `debug` is enabled in the configuration (DEBUG_HTTP).
 *
 * @module logger
 */

import { getConfig } from '../config/index.js';

/** Prefix put in front of every log line */
export const LOG_PREFIX = '[httpline]';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Create a logger whose lines carry the package prefix and an optional scope
 *
 * @param scope - Sub-system name, e.g. 'transport'
 */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `${LOG_PREFIX}[${scope}]` : LOG_PREFIX;

  return {
    debug(message, ...details) {
      if (getConfig().debug) {
        console.warn(`${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const logger: Logger = createLogger();
