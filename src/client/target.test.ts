import { describe, it, expect, afterEach } from 'vitest';
import { escapeTarget, plainTarget, resolveTarget, targetWithReferer } from './target.js';
import { resetConfig, updateConfig } from '../config/index.js';

describe('resolveTarget', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should refer a plain string target by itself', () => {
    updateConfig({ referer: undefined });
    expect(resolveTarget('/a b')).toEqual({ uri: '/a b', referer: '/a b' });
  });

  it('should prefer the configured referer for plain targets', () => {
    updateConfig({ referer: 'http://a.test/start' });
    expect(resolveTarget(plainTarget('/x'))).toEqual({ uri: '/x', referer: 'http://a.test/start' });
  });

  it('should keep the referer a target carries', () => {
    updateConfig({ referer: 'http://a.test/start' });
    expect(resolveTarget(targetWithReferer('/x', '/from'))).toEqual({ uri: '/x', referer: '/from' });
  });
});

describe('escapeTarget', () => {
  it('should escape spaces and tabs', () => {
    expect(escapeTarget('/a b\tc  d')).toBe('/a%20b%09c%20%20d');
  });

  it('should leave other characters alone', () => {
    expect(escapeTarget('/ü?q="x"&r=%41')).toBe('/ü?q="x"&r=%41');
  });
});
