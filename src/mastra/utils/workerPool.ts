import { ConfigurationError } from './errors.js';

/**
 * Counting semaphore bounding how many async operations run at once
 */
export class Semaphore {
  private permits: number;
  private waitQueue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new ConfigurationError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
      return;
    }
    this.permits++;
  }

  /**
   * Run `fn` once a permit is available, releasing it however `fn` settles
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  available(): number {
    return this.permits;
  }

  waiting(): number {
    return this.waitQueue.length;
  }
}

type Waiter<T> = (item: T | undefined) => void;

/**
 * FIFO queue whose consumers wait a bounded time for the next item.
 * Closing wakes every waiting consumer with `undefined`.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Queue is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Next item, or `undefined` when none arrives within `waitMs` or the queue closes
   */
  dequeue(waitMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      }, waitMs);
      this.waiters.push(waiter);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  /**
   * Remove and return every buffered item
   */
  drain(): T[] {
    return this.items.splice(0);
  }
}
