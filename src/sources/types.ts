/**
 * Event source contract.
 *
 * A source wraps one physical or virtual input and yields normalized
 * control events. The sequence is lazy, unbounded and can be iterated
 * only once; it ends when the source is closed.
 */

import type { ControlEvent } from "../types.js";

export interface EventSource {
  readonly id: string;
  events(): AsyncIterable<ControlEvent>;
  close(): Promise<void>;
}
