import { describe, it, expect } from "vitest";
import { EventQueue } from "../../src/sources/event-queue.js";
import { VirtualSource } from "../../src/sources/virtual-source.js";
import { cc } from "../helpers/fixtures.js";

describe("EventQueue", () => {
  it("hands out buffered events in order", async () => {
    const queue = new EventQueue();
    queue.push(cc(1, 1));
    queue.push(cc(2, 2));
    const seen: number[] = [];
    for await (const event of queue.iterate()) {
      seen.push(event.controlId);
      if (seen.length === 2) break;
    }
    expect(seen).toEqual([1, 2]);
    expect(queue.isClosed).toBe(true);
  });

  it("can only be iterated once", () => {
    const queue = new EventQueue();
    queue.iterate();
    expect(() => queue.iterate()).toThrow("event sequence already consumed");
  });

  it("discards buffered events on close", () => {
    const queue = new EventQueue();
    queue.push(cc(1, 1));
    queue.close();
    expect(queue.length).toBe(0);
    expect(queue.push(cc(1, 1))).toBe(false);
  });
});

describe("VirtualSource", () => {
  it("yields pushed events and stops after close", async () => {
    const source = new VirtualSource("virtual");
    const iterator = source.events()[Symbol.asyncIterator]();
    const pending = iterator.next();
    source.push(cc(9, 50));
    expect((await pending).value?.controlId).toBe(9);

    await source.close();
    expect((await iterator.next()).done).toBe(true);
  });
});
