import { describe, it, expect, afterEach, vi } from 'vitest';
import { LogLevel } from '@mastra/core/logger';
import { QueryCache } from './cache.js';
import { CacheSweeper, DEFAULT_SWEEP_INTERVAL_MS } from './cacheSweeper.js';
import { createLogger } from './logger.js';

const logger = createLogger('sweeper-test', LogLevel.ERROR);

describe('CacheSweeper', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('defaults to a five minute interval', () => {
    const sweeper = new CacheSweeper({ cleanupExpired: () => 0 }, { logger });
    expect(sweeper.intervalMs).toBe(DEFAULT_SWEEP_INTERVAL_MS);
    expect(DEFAULT_SWEEP_INTERVAL_MS).toBe(300_000);
  });

  it('sweeps on every interval while running', () => {
    vi.useFakeTimers();
    const cleanupExpired = vi.fn(() => 0);
    const sweeper = new CacheSweeper({ cleanupExpired }, { intervalMs: 1000, logger });

    sweeper.start();
    expect(sweeper.isRunning).toBe(true);
    vi.advanceTimersByTime(3500);
    expect(cleanupExpired).toHaveBeenCalledTimes(3);

    sweeper.stop();
    expect(sweeper.isRunning).toBe(false);
    vi.advanceTimersByTime(5000);
    expect(cleanupExpired).toHaveBeenCalledTimes(3);
  });

  it('ignores repeated start calls', () => {
    vi.useFakeTimers();
    const cleanupExpired = vi.fn(() => 0);
    const sweeper = new CacheSweeper({ cleanupExpired }, { intervalMs: 1000, logger });

    sweeper.start();
    sweeper.start();
    vi.advanceTimersByTime(1000);
    expect(cleanupExpired).toHaveBeenCalledTimes(1);
    sweeper.stop();
  });

  it('keeps sweeping after a failing tick', () => {
    vi.useFakeTimers();
    const cleanupExpired = vi
      .fn(() => 0)
      .mockImplementationOnce(() => {
        throw new Error('sweep failed');
      });
    const sweeper = new CacheSweeper({ cleanupExpired }, { intervalMs: 1000, logger });

    sweeper.start();
    vi.advanceTimersByTime(2000);
    expect(cleanupExpired).toHaveBeenCalledTimes(2);
    expect(sweeper.isRunning).toBe(true);
    sweeper.stop();
  });

  it('reports the outcome of a manual tick', () => {
    const failing = new CacheSweeper(
      {
        cleanupExpired: () => {
          throw new Error('boom');
        },
      },
      { logger }
    );
    expect(failing.tick()).toBe(false);

    const passing = new CacheSweeper({ cleanupExpired: () => 0 }, { logger });
    expect(passing.tick()).toBe(true);
  });

  it('removes expired query cache entries', () => {
    vi.useFakeTimers();
    const cache = new QueryCache<string>({ logger });
    cache.cacheQueryResult('stale', 'a', undefined, 1);
    cache.cacheQueryResult('fresh', 'b');
    const sweeper = new CacheSweeper(cache, { intervalMs: 2000, logger });

    sweeper.start();
    vi.advanceTimersByTime(2000);
    sweeper.stop();

    expect(cache.stats().queryCache.size).toBe(1);
    expect(cache.stats().queryCache.expired).toBe(1);
  });
});
