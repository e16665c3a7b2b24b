import { availableParallelism } from 'node:os';
import { describe, it, expect } from 'vitest';
import { parseSpiderConfig } from './spider-config.js';
import { ConfigError } from '../errors/spider-error.js';

describe('parseSpiderConfig', () => {
  it('fills documented defaults', () => {
    const config = parseSpiderConfig();

    expect(config.workers).toBe(availableParallelism() * 2);
    expect(config.timeoutMs).toBe(30_000);
    expect(config.downloadDelayMs).toBe(0);
    expect(config.randomDownloadDelay).toBe(true);
    expect(config.retryTimes).toBe(3);
    expect(config.retryCodes).toEqual([500, 502, 503, 504, 408, 429]);
    expect(config.retryDelayMs).toBe(3_000);
    expect(config.defaultHeaders).toEqual({ 'User-Agent': 'hookspider' });
    expect(config.abortMode).toBe('drain');
    expect(config.handleSignals).toBe(true);
    expect(config.statsIntervalMs).toBe(0);
  });

  it('keeps user overrides', () => {
    const config = parseSpiderConfig({
      workers: 1,
      retryTimes: 0,
      retryCodes: [503],
      randomDownloadDelay: [1, 2],
    });

    expect(config.workers).toBe(1);
    expect(config.retryTimes).toBe(0);
    expect(config.retryCodes).toEqual([503]);
    expect(config.randomDownloadDelay).toEqual([1, 2]);
  });

  it('freezes the result', () => {
    const config = parseSpiderConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retryCodes)).toBe(true);
    expect(Object.isFrozen(config.defaultHeaders)).toBe(true);
  });

  it('rejects retry codes outside the HTTP error range', () => {
    expect(() => parseSpiderConfig({ retryCodes: [200] })).toThrow(
      'retryCodes.0: retryCodes must be HTTP error codes (400-599)',
    );
  });

  it('collects every issue into a ConfigError', () => {
    try {
      parseSpiderConfig({ workers: 0, retryDelayMs: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          'workers: workers must be a positive integer',
          'retryDelayMs: retryDelayMs must be >= 0',
        ]);
      }
    }
  });
});
