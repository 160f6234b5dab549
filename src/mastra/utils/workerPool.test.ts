import { describe, it, expect, afterEach, vi } from 'vitest';
import { AsyncQueue, Semaphore } from './workerPool.js';
import { ConfigurationError } from './errors.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Semaphore', () => {
  it('never exceeds its permit count', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, (_, i) =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(5 + (i % 3));
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(semaphore.available()).toBe(2);
    expect(semaphore.waiting()).toBe(0);
  });

  it('releases the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.run(async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    expect(semaphore.available()).toBe(1);
  });

  it('queues acquirers once permits run out', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const second = semaphore.acquire();
    expect(semaphore.waiting()).toBe(1);

    semaphore.release();
    await second;
    expect(semaphore.waiting()).toBe(0);
    expect(semaphore.available()).toBe(0);
  });

  it('rejects a non-positive permit count', () => {
    expect(() => new Semaphore(0)).toThrow(ConfigurationError);
  });
});

describe('AsyncQueue', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns buffered items in FIFO order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    expect(await queue.dequeue(10)).toBe(1);
    expect(await queue.dequeue(10)).toBe(2);
  });

  it('hands a pushed item to a waiting consumer', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.dequeue(1000);
    queue.push('task');
    expect(await pending).toBe('task');
    expect(queue.size).toBe(0);
  });

  it('gives up after the wait elapses', async () => {
    vi.useFakeTimers();
    const queue = new AsyncQueue<string>();
    const pending = queue.dequeue(50);
    vi.advanceTimersByTime(50);
    expect(await pending).toBeUndefined();

    // The timed-out consumer no longer receives items
    queue.push('later');
    expect(queue.size).toBe(1);
  });

  it('wakes waiting consumers on close', async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.dequeue(10_000);
    const second = queue.dequeue(10_000);
    queue.close();

    expect(await first).toBeUndefined();
    expect(await second).toBeUndefined();
    expect(queue.isClosed).toBe(true);
    expect(await queue.dequeue(10_000)).toBeUndefined();
  });

  it('refuses items after close and drains what was buffered', () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.push('b');
    queue.close();

    expect(() => queue.push('c')).toThrow('Queue is closed');
    expect(queue.drain()).toEqual(['a', 'b']);
    expect(queue.size).toBe(0);
  });
});
