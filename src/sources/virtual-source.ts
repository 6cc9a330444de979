/**
 * In-process event source. Events are pushed by code: the deliver_event
 * tool, tests, or another adapter.
 */

import type { ControlEvent } from "../types.js";
import { EventQueue } from "./event-queue.js";
import type { EventSource } from "./types.js";

export class VirtualSource implements EventSource {
  private readonly queue = new EventQueue();

  constructor(readonly id: string) {}

  push(event: ControlEvent): boolean {
    return this.queue.push(event);
  }

  events(): AsyncIterable<ControlEvent> {
    return this.queue.iterate();
  }

  async close(): Promise<void> {
    this.queue.close();
  }
}
