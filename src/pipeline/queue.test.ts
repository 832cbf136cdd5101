import { describe, it, expect } from "vitest";
import { BoundedQueue, QueueClosedError } from "./queue";

const live = () => new AbortController();

describe("BoundedQueue", () => {
  it("should deliver items in FIFO order", async () => {
    const queue = new BoundedQueue<string>("q", 3);
    const { signal } = live();

    await queue.send("a", signal);
    await queue.send("b", signal);

    expect(await queue.receive(signal)).toEqual({ kind: "item", value: "a" });
    expect(await queue.receive(signal)).toEqual({ kind: "item", value: "b" });
  });

  it("should reject a non-positive capacity", () => {
    expect(() => new BoundedQueue<string>("q", 0)).toThrow(RangeError);
  });

  it("should suspend a sender while the buffer is full", async () => {
    const queue = new BoundedQueue<number>("q", 1);
    const { signal } = live();
    await queue.send(1, signal);

    let sent = false;
    const pending = queue.send(2, signal).then((ok) => {
      sent = ok;
    });
    await Promise.resolve();
    expect(sent).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.receive(signal)).toEqual({ kind: "item", value: 1 });
    await pending;
    expect(sent).toBe(true);
    expect(await queue.receive(signal)).toEqual({ kind: "item", value: 2 });
  });

  it("should hand an item straight to a waiting receiver", async () => {
    const queue = new BoundedQueue<string>("q", 1);
    const { signal } = live();

    const received = queue.receive(signal);
    await queue.send("x", signal);

    expect(await received).toEqual({ kind: "item", value: "x" });
    expect(queue.size).toBe(0);
  });

  it("should drain buffered items after close before reporting closed", async () => {
    const queue = new BoundedQueue<string>("q", 2);
    const { signal } = live();
    await queue.send("a", signal);
    queue.close();

    expect(await queue.receive(signal)).toEqual({ kind: "item", value: "a" });
    expect(await queue.receive(signal)).toEqual({ kind: "closed" });
  });

  it("should wake waiting receivers on close", async () => {
    const queue = new BoundedQueue<string>("q", 2);
    const { signal } = live();
    const first = queue.receive(signal);
    const second = queue.receive(signal);

    queue.close();

    expect(await first).toEqual({ kind: "closed" });
    expect(await second).toEqual({ kind: "closed" });
  });

  it("should refuse a second close", () => {
    const queue = new BoundedQueue<string>("q", 1);
    queue.close();

    expect(() => queue.close()).toThrow(QueueClosedError);
  });

  it("should refuse a send after close", async () => {
    const queue = new BoundedQueue<string>("q", 1);
    queue.close();

    await expect(queue.send("late", live().signal)).rejects.toBeInstanceOf(QueueClosedError);
  });

  it("should resolve a blocked send with false when cancelled", async () => {
    const queue = new BoundedQueue<string>("q", 1);
    const controller = live();
    await queue.send("a", controller.signal);

    const blocked = queue.send("b", controller.signal);
    controller.abort();

    expect(await blocked).toBe(false);
    expect(queue.size).toBe(1);
  });

  it("should resolve a blocked receive with cancelled", async () => {
    const queue = new BoundedQueue<string>("q", 1);
    const controller = live();

    const blocked = queue.receive(controller.signal);
    controller.abort();

    expect(await blocked).toEqual({ kind: "cancelled" });
  });

  it("should not enqueue when the signal is already aborted", async () => {
    const queue = new BoundedQueue<string>("q", 1);
    const controller = live();
    controller.abort();

    expect(await queue.send("a", controller.signal)).toBe(false);
    expect(await queue.receive(controller.signal)).toEqual({ kind: "cancelled" });
    expect(queue.size).toBe(0);
  });
});
