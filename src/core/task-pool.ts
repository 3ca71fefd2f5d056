/**
 * TaskPool: runs submitted tasks with bounded concurrency.
 *
 * At most `maxConcurrency` tasks run at once; the rest wait in FIFO order.
 * Tasks run independently: one that throws or never settles does not
 * affect the others, though a stuck task keeps its slot.
 */

import { toError } from './client-error.js';

export type Task = () => unknown;

export interface TaskPoolOptions {
  maxConcurrency: number;
  /** Receives failures of tasks that threw or rejected. Must not throw. */
  onTaskError?: (error: Error) => void;
}

export class TaskPool {
  private readonly maxConcurrency: number;
  private readonly onTaskError: (error: Error) => void;
  private readonly queue: Task[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TaskPoolOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new Error('maxConcurrency must be a positive integer');
    }
    this.maxConcurrency = options.maxConcurrency;
    this.onTaskError = options.onTaskError ?? (() => undefined);
  }

  /** Tasks currently executing. */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a free slot. */
  get queued(): number {
    return this.queue.length;
  }

  /** Queue a task. It starts immediately when a slot is free. */
  submit(task: Task): void {
    this.queue.push(task);
    this.drain();
  }

  /** Resolves once no task is running or queued. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.active < this.maxConcurrency) {
      const task = this.queue.shift();
      if (task === undefined) break;
      this.active++;
      void this.execute(task);
    }
    if (this.active === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute(task: Task): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.onTaskError(toError(err));
    } finally {
      this.active--;
      this.drain();
    }
  }
}
