/**
 * Bounded Worker Pool
 *
 * Runs asynchronous tasks with at most `concurrency` in flight. Results are
 * collected per task and only handed back once every admitted task has
 * settled. With `stopOnError`, the first failure stops admission: queued
 * tasks never start and `done()` rejects with that failure.
 */

import { ValidationError } from './errors';

export const DEFAULT_CONCURRENCY = 10;

export interface WorkerPoolOptions {
  concurrency?: number;
  stopOnError?: boolean;
}

type Task<T> = () => Promise<T>;

interface QueuedTask<T> {
  index: number;
  task: Task<T>;
}

export class WorkerPool<T> {
  private readonly concurrency: number;
  private readonly stopOnError: boolean;
  private readonly queue: QueuedTask<T>[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private readonly values: T[] = [];
  private submitted = 0;
  private stopped = false;
  private closed = false;
  private firstError: Error | null = null;

  constructor(options: WorkerPoolOptions = {}) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(
        `worker pool concurrency must be a positive integer, got ${concurrency}`,
        'driftwatch',
        { concurrency }
      );
    }
    this.concurrency = concurrency;
    this.stopOnError = options.stopOnError ?? true;
  }

  /**
   * Queue a task. Returns false when the pool has stopped after a failure and
   * the task was not accepted.
   */
  do(task: Task<T>): boolean {
    if (this.closed) {
      throw new ValidationError('cannot submit tasks after done() was called', 'driftwatch');
    }
    if (this.stopped) {
      return false;
    }
    this.queue.push({ index: this.submitted++, task });
    this.dispatch();
    return true;
  }

  /**
   * Wait for every admitted task. Resolves with results in submission order,
   * or rejects with the first error.
   */
  async done(): Promise<T[]> {
    this.closed = true;
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
    if (this.firstError) {
      throw this.firstError;
    }
    return this.values;
  }

  private dispatch(): void {
    while (this.inflight.size < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      if (this.stopped) {
        continue;
      }
      const running: Promise<void> = this.run(next).finally(() => {
        this.inflight.delete(running);
        this.dispatch();
      });
      this.inflight.add(running);
    }
  }

  private async run({ index, task }: QueuedTask<T>): Promise<void> {
    try {
      this.values[index] = await task();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (!this.firstError) {
        this.firstError = failure;
      }
      if (this.stopOnError) {
        this.stopped = true;
      }
    }
  }
}
