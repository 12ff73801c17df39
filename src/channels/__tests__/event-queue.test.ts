import { describe, it, expect } from "vitest";
import { EventQueue } from "../event-queue.js";
import { AbortError } from "../../utils/clock.js";

describe("EventQueue", () => {
  it("hands buffered items out in order", async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting taker on push", async () => {
    const queue = new EventQueue<string>();
    const pending = queue.take();
    queue.push("a");
    expect(await pending).toBe("a");
    expect(queue.size).toBe(0);
  });

  it("rejects a waiting taker when the signal aborts", async () => {
    const queue = new EventQueue<string>();
    const controller = new AbortController();
    const pending = queue.take(controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortError);

    // the aborted waiter must not swallow the next item
    queue.push("b");
    expect(queue.size).toBe(1);
  });

  it("rejects waiters on close and ignores later pushes", async () => {
    const queue = new EventQueue<string>();
    const pending = queue.take();
    queue.close();
    await expect(pending).rejects.toThrow("Queue closed");
    queue.push("late");
    expect(queue.size).toBe(0);
    await expect(queue.take()).rejects.toBeInstanceOf(AbortError);
  });

  it("accepts items again after reopen", async () => {
    const queue = new EventQueue<string>();
    queue.close();
    queue.reopen();
    queue.push("c");
    expect(await queue.take()).toBe("c");
  });

  it("drain yields until the queue closes", async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    const seen: number[] = [];
    const done = (async () => {
      for await (const item of queue.drain()) {
        seen.push(item);
        if (item === 3) queue.close();
      }
    })();
    queue.push(3);
    await done;
    expect(seen).toEqual([1, 2, 3]);
  });

  it("drain ends quietly on abort", async () => {
    const queue = new EventQueue<number>();
    const controller = new AbortController();
    const done = (async () => {
      const seen: number[] = [];
      for await (const item of queue.drain(controller.signal)) seen.push(item);
      return seen;
    })();
    controller.abort();
    expect(await done).toEqual([]);
  });
});
