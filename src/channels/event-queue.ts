/**
 * In-memory hand-off between a socket reader and the event consumer.
 */

import { AbortError } from "../utils/clock.js";

type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (err: Error) => void;
};

export class EventQueue<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  /** Next item; rejects with AbortError when `signal` aborts or the queue closes. */
  take(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.closed) return Promise.reject(new AbortError("Queue closed"));
    if (signal?.aborted) return Promise.reject(new AbortError());

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new AbortError());
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(item);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Yields items until `signal` aborts or the queue closes. */
  async *drain(signal?: AbortSignal): AsyncGenerator<T> {
    while (true) {
      let item: T;
      try {
        item = await this.take(signal);
      } catch (err) {
        if (err instanceof AbortError) return;
        throw err;
      }
      yield item;
    }
  }

  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(new AbortError("Queue closed"));
  }

  reopen(): void {
    this.closed = false;
  }

  get size(): number {
    return this.items.length;
  }
}
