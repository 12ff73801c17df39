/**
 * Keyed task scheduler.
 *
 * Tasks with the same key run one at a time in submission order; tasks with
 * different keys run in parallel, at most `concurrency` at once. Keys waiting
 * for a free slot are admitted in FIFO order.
 */

import { createLogger } from "../utils/logger.js";
import { describeError } from "../core/errors.js";

const log = createLogger("scheduler");

export type ScheduledTask = (signal: AbortSignal) => Promise<void>;

interface Job {
  run: ScheduledTask;
  /** Called instead of `run` when the job is cancelled before it starts. */
  cancel?: () => void;
}

interface Active {
  job: Job;
  controller: AbortController;
}

export class ScopeScheduler {
  private readonly queues = new Map<string, Job[]>();
  private readonly active = new Map<string, Active>();
  private ready: string[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  enqueue(key: string, run: ScheduledTask, cancel?: () => void): void {
    const queue = this.queues.get(key);
    if (queue) {
      queue.push({ run, cancel });
    } else {
      this.queues.set(key, [{ run, cancel }]);
    }
    if (!this.active.has(key) && !this.ready.includes(key)) {
      this.ready.push(key);
    }
    this.pump();
  }

  /** Drop every job that has not started yet. Returns how many were dropped. */
  cancelPending(): number {
    let cancelled = 0;
    for (const queue of this.queues.values()) {
      for (const job of queue) {
        cancelled += 1;
        try {
          job.cancel?.();
        } catch (err) {
          log.error(`Cancel hook failed: ${describeError(err)}`);
        }
      }
    }
    this.queues.clear();
    this.ready = [];
    this.notifyIdle();
    return cancelled;
  }

  /** Signal every running task to stop. */
  abortRunning(): void {
    for (const { controller } of this.active.values()) {
      controller.abort();
    }
  }

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  isBusy(key: string): boolean {
    return this.active.has(key) || (this.queues.get(key)?.length ?? 0) > 0;
  }

  get activeCount(): number {
    return this.active.size;
  }

  get pendingCount(): number {
    let count = 0;
    for (const queue of this.queues.values()) count += queue.length;
    return count;
  }

  private pump(): void {
    while (this.active.size < this.concurrency && this.ready.length > 0) {
      const [key] = this.ready.splice(0, 1);
      const queue = this.queues.get(key);
      const job = queue?.shift();
      if (!queue || !job) continue;
      if (queue.length === 0) this.queues.delete(key);

      const controller = new AbortController();
      this.active.set(key, { job, controller });
      void this.execute(key, job, controller.signal);
    }
  }

  private async execute(key: string, job: Job, signal: AbortSignal): Promise<void> {
    try {
      await job.run(signal);
    } catch (err) {
      log.error(`Task for ${key} failed: ${describeError(err)}`);
    } finally {
      this.active.delete(key);
      if (this.queues.has(key)) this.ready.push(key);
      this.pump();
      this.notifyIdle();
    }
  }

  private isIdle(): boolean {
    return this.active.size === 0 && this.queues.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
