/**
 * Bounded-concurrency task queue for crawl jobs
 */

import PQueue from 'p-queue';
import { CancelledError, errorMessage } from '../errors.js';
import type { Logger, Priority, QueueStats } from '../types.js';

/**
 * p-queue runs higher numbers first
 */
export const PRIORITY_VALUES: Record<Priority, number> = {
  low: 1,
  normal: 5,
  high: 10,
};

export type JobTask = (signal: AbortSignal) => Promise<void>;

/**
 * Observable lifecycle of one submitted job
 */
export class TaskHandle {
  readonly id: string;
  readonly priority: Priority;
  readonly controller = new AbortController();
  /** Settles when the job has finished or been dropped; never rejects */
  done: Promise<void> = Promise.resolve();
  started = false;
  finished = false;
  /** Error the task ended with, if any */
  error?: unknown;

  constructor(id: string, priority: Priority) {
    this.id = id;
    this.priority = priority;
  }
}

/**
 * Job queue manager for handling crawl jobs
 */
export class JobQueue {
  private queue: PQueue;
  private logger: Logger;
  private handles: Map<string, TaskHandle> = new Map();

  constructor(logger: Logger, concurrency: number = 10) {
    this.logger = logger;
    this.queue = new PQueue({ concurrency });

    // Handle queue events
    this.queue.on('active', () => {
      this.logger.debug(`Queue active, size: ${this.queue.size}, pending: ${this.queue.pending}`);
    });

    this.queue.on('idle', () => {
      this.logger.debug('Queue is idle');
    });
  }

  /**
   * Schedule a job. The task receives a signal that aborts on cancel; if the
   * job is cancelled before it starts, the task never runs.
   */
  submit(id: string, priority: Priority, task: JobTask): TaskHandle {
    if (this.handles.has(id)) {
      throw new Error(`Job ${id} is already queued`);
    }

    const handle = new TaskHandle(id, priority);

    const run = async (): Promise<void> => {
      handle.started = true;
      if (handle.controller.signal.aborted) {
        return;
      }
      await task(handle.controller.signal);
    };

    handle.done = this.queue
      .add(run, { priority: PRIORITY_VALUES[priority], throwOnTimeout: true })
      .catch((error: unknown) => {
        handle.error = error;
        this.logger.error(`Job ${id} ended with an error`, { error: errorMessage(error) });
      })
      .finally(() => {
        handle.finished = true;
        if (this.handles.get(id) === handle) {
          this.handles.delete(id);
        }
      });

    this.handles.set(id, handle);
    return handle;
  }

  trackedIds(): string[] {
    return Array.from(this.handles.keys());
  }

  get(id: string): TaskHandle | undefined {
    return this.handles.get(id);
  }

  /**
   * Abort a queued or running job. Returns the handle, or undefined when the
   * job is not tracked.
   */
  cancel(id: string): TaskHandle | undefined {
    const handle = this.handles.get(id);
    if (!handle) {
      return undefined;
    }
    if (!handle.controller.signal.aborted) {
      handle.controller.abort(new CancelledError());
      this.logger.info(`Cancelled job ${id}`, { started: handle.started });
    }
    return handle;
  }

  /**
   * Abort every tracked job and wait for the queue to drain
   */
  async close(): Promise<void> {
    const handles = Array.from(this.handles.values());
    for (const handle of handles) {
      this.cancel(handle.id);
    }
    await this.queue.onIdle();
    await Promise.all(handles.map(handle => handle.done));
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /**
   * Get queue statistics
   */
  getStats(): QueueStats {
    return {
      queued: this.queue.size,
      running: this.queue.pending,
      tracked: this.handles.size,
      concurrency: this.queue.concurrency,
    };
  }
}
