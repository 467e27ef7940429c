import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, LOG_PREFIX } from './index.js';
import { updateConfig, resetConfig } from '../config/index.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetConfig();
  });

  it('should prefix warnings with the package name', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger().warn('no response');
    expect(warn).toHaveBeenCalledWith(`${LOG_PREFIX} no response`);
  });

  it('should add the scope after the prefix', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('transport').error('boom', 42);
    expect(error).toHaveBeenCalledWith('[httpline][transport] boom', 42);
  });

  it('should write info lines through console.log', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger().info('ready');
    expect(log).toHaveBeenCalledWith('[httpline] ready');
  });

  it('should drop debug lines while debug is off', () => {
    updateConfig({ debug: false });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger().debug('GET / HTTP/1.0');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should write debug lines while debug is on', () => {
    updateConfig({ debug: true });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('client').debug('GET / HTTP/1.0');
    expect(warn).toHaveBeenCalledWith('[httpline][client] GET / HTTP/1.0');
  });
});
