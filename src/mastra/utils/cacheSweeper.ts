import { errorMessage } from './errors.js';
import { createLogger, type IMastraLogger } from './logger.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 300_000;

/**
 * Anything with an expiry sweep: a QueryCache, a BoundedCache
 */
export interface ExpiringCache {
  cleanupExpired(): unknown;
}

export interface CacheSweeperOptions {
  intervalMs?: number;
  logger?: IMastraLogger;
}

/**
 * Periodically removes expired cache entries.
 * The timer is unref'd so a running sweeper never keeps the process alive.
 */
export class CacheSweeper {
  readonly intervalMs: number;
  private readonly target: ExpiringCache;
  private readonly logger: IMastraLogger;
  private timer?: NodeJS.Timeout;

  constructor(target: ExpiringCache, options: CacheSweeperOptions = {}) {
    this.target = target;
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.logger = options.logger ?? createLogger('cache-sweeper');
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
    this.logger.info('Cache sweeper started', { operation: 'cache_sweeper_start', intervalMs: this.intervalMs });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.info('Cache sweeper stopped', { operation: 'cache_sweeper_stop' });
  }

  /**
   * Run one sweep. Returns false when the sweep threw; the schedule keeps going.
   */
  tick(): boolean {
    try {
      this.target.cleanupExpired();
      return true;
    } catch (error) {
      this.logger.error(`Cache cleanup failed: ${errorMessage(error)}`, { operation: 'cache_sweep' });
      return false;
    }
  }
}
