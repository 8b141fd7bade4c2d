import { describe, expect, it } from "vitest";
import { BoundedQueue } from "./queue";

async function drain<T>(queue: BoundedQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) items.push(item);
  return items;
}

describe("BoundedQueue", () => {
  it("holds the producer while the queue is full", async () => {
    const queue = new BoundedQueue<number>(2);
    await queue.push(1);
    await queue.push(2);

    let pushed = false;
    const third = queue.push(3).then((accepted) => {
      pushed = accepted;
    });
    await Promise.resolve();
    expect(pushed).toBe(false);
    expect(queue.size).toBe(2);

    expect(await queue.next()).toEqual({ done: false, value: 1 });
    await third;
    expect(pushed).toBe(true);
    expect(queue.size).toBe(2);
  });

  it("delivers items in order and ends after close", async () => {
    const queue = new BoundedQueue<string>(1);
    const producer = (async () => {
      for (const item of ["a", "b", "c"]) await queue.push(item);
      queue.close();
    })();

    expect(await drain(queue)).toEqual(["a", "b", "c"]);
    await producer;
  });

  it("rethrows a producer failure after draining", async () => {
    const queue = new BoundedQueue<number>(4);
    await queue.push(1);
    queue.fail(new Error("source went away"));

    expect(await queue.next()).toEqual({ done: false, value: 1 });
    await expect(queue.next()).rejects.toThrow("source went away");
  });

  it("drops queued items and releases a waiting producer on cancel", async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);

    queue.cancel();

    await expect(blocked).resolves.toBe(false);
    expect(queue.size).toBe(0);
    expect(await queue.next()).toEqual({ done: true, value: undefined });
  });

  it("refuses items after close", async () => {
    const queue = new BoundedQueue<number>(1);
    queue.close();

    await expect(queue.push(1)).resolves.toBe(false);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});
