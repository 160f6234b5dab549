import { OptimizedChunker, type ChunkOptions } from './chunker.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createLogger, type IMastraLogger } from './logger.js';
import {
  TERMINAL_STATUSES,
  type ProcessingStatus,
  type ChunkUnit,
  type ProcessingResult,
  type ProcessingTask,
  type TaskMetadata,
} from './types.js';
import { AsyncQueue, Semaphore } from './workerPool.js';

/**
 * Work applied to every chunk of a task. Chunk results are collected in chunk order
 * regardless of completion order.
 */
export type ChunkWorker<R> = (chunk: string, chunkIndex: number, metadata: TaskMetadata) => Promise<R>;

export type CompletionCallback<R> = (task: ProcessingTask<R>) => void | Promise<void>;

export interface AsyncDocumentProcessorOptions<R> {
  chunkWorker: ChunkWorker<R>;
  /** Concurrent tasks */
  maxWorkers?: number;
  /** Concurrent chunks within one task */
  maxChunkWorkers?: number;
  /** Character count above which a document should go through the processor */
  largeDocThreshold?: number;
  /** How long an idle worker waits on the queue before re-checking for shutdown */
  dequeueWaitMs?: number;
  chunker?: OptimizedChunker;
  logger?: IMastraLogger;
}

export interface ProcessingStats {
  totalTasks: number;
  statusCounts: Record<ProcessingStatus, number>;
  queueSize: number;
  activeWorkers: number;
  maxWorkers: number;
  avgProcessingTimeMs: number;
  largeDocThreshold: number;
}

interface TrackedTask<R> {
  task: ProcessingTask<R>;
  /** Resolves once the task reaches a terminal state */
  settled: Promise<void>;
  settle: () => void;
  onComplete?: CompletionCallback<R>;
  chunkOptions?: ChunkOptions;
}

type ChunkOutcome<R> = { value: R } | undefined;

/**
 * Describe a chunk without transforming it
 */
export async function describeChunk(chunk: string, chunkIndex: number, metadata: TaskMetadata): Promise<ChunkUnit> {
  const started = performance.now();
  const wordCount = chunk.split(/\s+/).filter(Boolean).length;
  return {
    chunkIndex,
    content: chunk,
    wordCount,
    charCount: chunk.length,
    processingTimeMs: performance.now() - started,
    metadata: { ...metadata },
  };
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function snapshot<R>(task: ProcessingTask<R>): ProcessingTask<R> {
  return { ...task, metadata: { ...task.metadata } };
}

/**
 * Task queue that chunks large documents and runs per-chunk work on a bounded pool.
 *
 * Task lifecycle: pending → processing → completed | failed, or pending → cancelled.
 * Terminal states never change. All state transitions happen between awaits, so a
 * snapshot never shows a half-updated task.
 */
export class AsyncDocumentProcessor<R = ChunkUnit> {
  readonly maxWorkers: number;
  readonly maxChunkWorkers: number;
  readonly largeDocThreshold: number;
  readonly dequeueWaitMs: number;
  private readonly chunker: OptimizedChunker;
  private readonly chunkWorker: ChunkWorker<R>;
  private readonly logger: IMastraLogger;
  private readonly tasks = new Map<string, TrackedTask<R>>();
  private readonly queue = new AsyncQueue<string>();
  private workers: Promise<void>[] = [];
  private activeWorkers = 0;
  private shuttingDown = false;

  constructor(options: AsyncDocumentProcessorOptions<R>) {
    this.maxWorkers = positiveInteger('maxWorkers', options.maxWorkers ?? 4);
    this.maxChunkWorkers = positiveInteger('maxChunkWorkers', options.maxChunkWorkers ?? 4);
    this.largeDocThreshold = options.largeDocThreshold ?? 50_000;
    if (this.largeDocThreshold < 0) {
      throw new ConfigurationError(`largeDocThreshold must not be negative, got ${this.largeDocThreshold}`);
    }
    this.dequeueWaitMs = options.dequeueWaitMs ?? 1000;
    this.chunkWorker = options.chunkWorker;
    this.logger = options.logger ?? createLogger('async-document-processor');
    this.chunker = options.chunker ?? new OptimizedChunker({ logger: this.logger });
  }

  get isRunning(): boolean {
    return this.workers.length > 0 && !this.shuttingDown;
  }

  shouldProcessAsync(content: string): boolean {
    return content.length > this.largeDocThreshold;
  }

  /**
   * Launch the worker loops. Calling it again while running does nothing.
   */
  start(): void {
    if (this.shuttingDown) {
      throw new Error('Processor has been shut down');
    }
    if (this.workers.length > 0) {
      return;
    }

    this.workers = Array.from({ length: this.maxWorkers }, (_, workerId) => this.workerLoop(workerId));
    this.logger.info(`Started ${this.maxWorkers} document workers`, {
      operation: 'processor_start',
      maxWorkers: this.maxWorkers,
      maxChunkWorkers: this.maxChunkWorkers,
    });
  }

  /**
   * Queue a document and return its initial snapshot immediately. `chunkOptions` are
   * handed to the chunker in place of type detection.
   */
  submitTask(
    taskId: string,
    content: string,
    metadata: TaskMetadata = {},
    onComplete?: CompletionCallback<R>,
    chunkOptions?: ChunkOptions
  ): ProcessingTask<R> {
    if (this.shuttingDown) {
      throw new Error('Processor has been shut down');
    }
    const existing = this.tasks.get(taskId);
    if (existing && !TERMINAL_STATUSES.has(existing.task.status)) {
      throw new Error(`Task ${taskId} is already ${existing.task.status}`);
    }

    let settle: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const task: ProcessingTask<R> = {
      taskId,
      content,
      metadata: { ...metadata },
      status: 'pending',
      progress: 0,
      createdAt: Date.now(),
    };

    this.tasks.set(taskId, { task, settled, settle, onComplete, chunkOptions });
    this.queue.push(taskId);

    this.logger.info(`Submitted task ${taskId}`, {
      operation: 'submit_task',
      taskId,
      contentLength: content.length,
      queueSize: this.queue.size,
    });

    return snapshot(task);
  }

  getTaskStatus(taskId: string): ProcessingTask<R> | undefined {
    const tracked = this.tasks.get(taskId);
    return tracked ? snapshot(tracked.task) : undefined;
  }

  /**
   * Wait for a task to settle. Resolves with the result when it completed, and with
   * `undefined` for an unknown id, a failed or cancelled task, or when `timeoutMs`
   * elapses first. The timeout only stops the wait; the task keeps running.
   */
  async waitForTask(taskId: string, timeoutMs?: number): Promise<ProcessingResult<R> | undefined> {
    const tracked = this.tasks.get(taskId);
    if (!tracked) {
      return undefined;
    }

    if (timeoutMs === undefined) {
      await tracked.settled;
    } else {
      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });
      const outcome = await Promise.race([tracked.settled.then(() => 'settled' as const), timedOut]);
      clearTimeout(timer);

      if (outcome === 'timeout') {
        this.logger.warn(`Timed out waiting for task ${taskId}`, {
          operation: 'wait_for_task',
          taskId,
          timeoutMs,
          status: tracked.task.status,
        });
        return undefined;
      }
    }

    return tracked.task.status === 'completed' ? tracked.task.result : undefined;
  }

  /**
   * Cancel a task that has not started yet
   */
  cancelTask(taskId: string): boolean {
    const tracked = this.tasks.get(taskId);
    if (!tracked || tracked.task.status !== 'pending') {
      return false;
    }

    tracked.task.status = 'cancelled';
    tracked.task.completedAt = Date.now();
    tracked.settle();
    this.logger.info(`Cancelled task ${taskId}`, { operation: 'cancel_task', taskId });
    return true;
  }

  /**
   * Forget terminal tasks that settled more than `maxAgeHours` ago
   */
  cleanupCompletedTasks(maxAgeHours = 24): number {
    const cutoff = Date.now() - maxAgeHours * 3_600_000;
    let removed = 0;

    for (const [taskId, { task }] of [...this.tasks]) {
      if (TERMINAL_STATUSES.has(task.status) && task.completedAt !== undefined && task.completedAt < cutoff) {
        this.tasks.delete(taskId);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info(`Cleaned up ${removed} finished tasks`, { operation: 'cleanup_tasks', removed, maxAgeHours });
    }
    return removed;
  }

  getProcessingStats(): ProcessingStats {
    const statusCounts: Record<ProcessingStatus, number> = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    let completedTime = 0;
    let completedCount = 0;

    for (const { task } of this.tasks.values()) {
      statusCounts[task.status]++;
      if (task.status === 'completed' && task.result) {
        completedTime += task.result.processingTimeMs;
        completedCount++;
      }
    }

    return {
      totalTasks: this.tasks.size,
      statusCounts,
      queueSize: this.queue.size,
      activeWorkers: this.activeWorkers,
      maxWorkers: this.maxWorkers,
      avgProcessingTimeMs: completedCount > 0 ? completedTime / completedCount : 0,
      largeDocThreshold: this.largeDocThreshold,
    };
  }

  /**
   * Stop accepting work, let running tasks finish (up to `timeoutMs`), then cancel
   * whatever is still queued
   */
  async shutdown(timeoutMs = 30_000): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.queue.close();
    this.logger.info('Shutting down document processor', { operation: 'processor_shutdown' });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const finished = await Promise.race([Promise.all(this.workers).then(() => true), timedOut]);
    clearTimeout(timer);

    if (!finished) {
      this.logger.warn(`Workers still busy after ${timeoutMs}ms`, {
        operation: 'processor_shutdown',
        activeWorkers: this.activeWorkers,
      });
    }

    for (const taskId of this.queue.drain()) {
      this.cancelTask(taskId);
    }
    this.workers = [];
    this.logger.info('Document processor stopped', { operation: 'processor_shutdown' });
  }

  private async workerLoop(workerId: number): Promise<void> {
    this.logger.debug(`Worker ${workerId} started`, { operation: 'worker_loop', workerId });

    while (!this.shuttingDown) {
      const taskId = await this.queue.dequeue(this.dequeueWaitMs);
      if (taskId === undefined) {
        continue;
      }

      const tracked = this.tasks.get(taskId);
      if (!tracked || tracked.task.status !== 'pending') {
        continue;
      }

      this.activeWorkers++;
      try {
        await this.runTask(tracked);
      } finally {
        this.activeWorkers--;
      }
    }

    this.logger.debug(`Worker ${workerId} stopped`, { operation: 'worker_loop', workerId });
  }

  private async runTask(tracked: TrackedTask<R>): Promise<void> {
    const { task } = tracked;
    task.status = 'processing';
    task.startedAt = Date.now();
    task.progress = 10;
    this.logger.info(`Processing task ${task.taskId}`, { operation: 'process_task', taskId: task.taskId });

    try {
      const result = await this.processContent(task, tracked.chunkOptions);
      task.result = result;
      task.status = 'completed';
      task.progress = 100;
      task.completedAt = Date.now();
      this.logger.info(`Completed task ${task.taskId}`, {
        operation: 'process_task',
        taskId: task.taskId,
        totalChunks: result.totalChunks,
        failedChunks: result.failedChunks,
        processingTimeMs: result.processingTimeMs,
      });
    } catch (error) {
      task.status = 'failed';
      task.error = errorMessage(error);
      task.completedAt = Date.now();
      this.logger.error(`Task ${task.taskId} failed: ${task.error}`, {
        operation: 'process_task',
        taskId: task.taskId,
      });
    }

    try {
      if (task.status === 'completed' && tracked.onComplete) {
        await tracked.onComplete(snapshot(task));
      }
    } catch (error) {
      this.logger.error(`Completion callback for task ${task.taskId} failed: ${errorMessage(error)}`, {
        operation: 'task_callback',
        taskId: task.taskId,
      });
    } finally {
      tracked.settle();
    }
  }

  private async processContent(task: ProcessingTask<R>, chunkOptions?: ChunkOptions): Promise<ProcessingResult<R>> {
    const started = performance.now();
    const filename = typeof task.metadata.filename === 'string' ? task.metadata.filename : undefined;

    const { chunks, metadata: chunkMetadata } = this.chunker.chunk(task.content, filename, chunkOptions);
    task.progress = 30;

    const outcomes: ChunkOutcome<R>[] = new Array<ChunkOutcome<R>>(chunks.length).fill(undefined);
    const failedChunkIndices: number[] = [];
    const pool = new Semaphore(Math.max(1, Math.min(this.maxChunkWorkers, chunks.length)));
    let settledChunks = 0;

    await Promise.all(
      chunks.map((chunk, chunkIndex) =>
        pool.run(async () => {
          try {
            outcomes[chunkIndex] = { value: await this.chunkWorker(chunk, chunkIndex, task.metadata) };
          } catch (error) {
            failedChunkIndices.push(chunkIndex);
            this.logger.error(`Chunk ${chunkIndex} of task ${task.taskId} failed: ${errorMessage(error)}`, {
              operation: 'process_chunk',
              taskId: task.taskId,
              chunkIndex,
            });
          } finally {
            settledChunks++;
            task.progress = 30 + Math.floor((60 * settledChunks) / chunks.length);
          }
        })
      )
    );

    const ordered: R[] = [];
    for (const outcome of outcomes) {
      if (outcome) {
        ordered.push(outcome.value);
      }
    }
    failedChunkIndices.sort((a, b) => a - b);
    task.progress = 95;

    return {
      chunks: ordered,
      chunkMetadata,
      totalChunks: chunks.length,
      successfulChunks: ordered.length,
      failedChunks: failedChunkIndices.length,
      failedChunkIndices,
      processingTimeMs: performance.now() - started,
    };
  }
}
