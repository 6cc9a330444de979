/**
 * Push-to-pull adapter: producers push events, one consumer iterates them.
 */

import type { ControlEvent } from "../types.js";

export class EventQueue {
  private readonly buffer: ControlEvent[] = [];
  private waiter: ((result: IteratorResult<ControlEvent>) => void) | null = null;
  private closed = false;
  private iterated = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.buffer.length;
  }

  /** @returns false when the queue is closed and the event was discarded */
  push(event: ControlEvent): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
    return true;
  }

  /** Stop accepting events. Buffered events are discarded; the iterator ends. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ value: undefined, done: true });
  }

  /** @throws if called a second time; the sequence cannot be restarted */
  iterate(): AsyncIterable<ControlEvent> {
    if (this.iterated) {
      throw new Error("event sequence already consumed; sources cannot be restarted");
    }
    this.iterated = true;
    return {
      [Symbol.asyncIterator]: () => ({
        next: () => this.next(),
        return: async () => {
          this.close();
          return { value: undefined, done: true };
        },
      }),
    };
  }

  private next(): Promise<IteratorResult<ControlEvent>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
