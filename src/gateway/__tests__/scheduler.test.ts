import { describe, it, expect, vi } from "vitest";
import { ScopeScheduler } from "../scheduler.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("ScopeScheduler", () => {
  it("runs tasks for one key strictly in order", async () => {
    const scheduler = new ScopeScheduler(4);
    const log: string[] = [];
    const first = deferred();

    scheduler.enqueue("a", async () => {
      log.push("a1 start");
      await first.promise;
      log.push("a1 end");
    });
    scheduler.enqueue("a", async () => {
      log.push("a2 start");
    });

    await tick();
    expect(log).toEqual(["a1 start"]);

    first.resolve();
    await scheduler.idle();
    expect(log).toEqual(["a1 start", "a1 end", "a2 start"]);
  });

  it("runs different keys in parallel", async () => {
    const scheduler = new ScopeScheduler(4);
    const gate = deferred();
    const started: string[] = [];

    for (const key of ["a", "b", "c"]) {
      scheduler.enqueue(key, async () => {
        started.push(key);
        await gate.promise;
      });
    }

    await tick();
    expect(started).toEqual(["a", "b", "c"]);
    expect(scheduler.activeCount).toBe(3);

    gate.resolve();
    await scheduler.idle();
    expect(scheduler.activeCount).toBe(0);
  });

  it("admits waiting keys in FIFO order under the concurrency cap", async () => {
    const scheduler = new ScopeScheduler(1);
    const order: string[] = [];
    const gate = deferred();

    scheduler.enqueue("a", async () => {
      order.push("a");
      await gate.promise;
    });
    scheduler.enqueue("b", async () => {
      order.push("b");
    });
    scheduler.enqueue("c", async () => {
      order.push("c");
    });

    await tick();
    expect(order).toEqual(["a"]);
    expect(scheduler.pendingCount).toBe(2);

    gate.resolve();
    await scheduler.idle();
    expect(order).toEqual(["a", "b", "c"]);
  });

  it("keeps going after a task throws", async () => {
    const scheduler = new ScopeScheduler(1);
    const ran = vi.fn();

    scheduler.enqueue("a", async () => {
      throw new Error("boom");
    });
    scheduler.enqueue("a", async () => {
      ran();
    });

    await scheduler.idle();
    expect(ran).toHaveBeenCalledTimes(1);
  });

  it("cancels queued tasks without running them", async () => {
    const scheduler = new ScopeScheduler(1);
    const gate = deferred();
    const cancelled = vi.fn();
    const ran = vi.fn();

    scheduler.enqueue("a", async () => {
      await gate.promise;
    });
    scheduler.enqueue("a", async () => ran(), () => cancelled("a2"));
    scheduler.enqueue("b", async () => ran(), () => cancelled("b1"));

    expect(scheduler.cancelPending()).toBe(2);
    expect(cancelled.mock.calls).toEqual([["a2"], ["b1"]]);

    gate.resolve();
    await scheduler.idle();
    expect(ran).not.toHaveBeenCalled();
  });

  it("aborts running tasks through their signal", async () => {
    const scheduler = new ScopeScheduler(2);
    let aborted = false;

    scheduler.enqueue("a", (signal) => {
      return new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          resolve();
        });
      });
    });

    await tick();
    expect(scheduler.isBusy("a")).toBe(true);
    scheduler.abortRunning();
    await scheduler.idle();

    expect(aborted).toBe(true);
    expect(scheduler.isBusy("a")).toBe(false);
  });

  it("resolves idle() immediately when nothing is scheduled", async () => {
    await expect(new ScopeScheduler(1).idle()).resolves.toBeUndefined();
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new ScopeScheduler(0)).toThrow(RangeError);
  });
});
