/**
 * Learn mode: capture the next qualifying control event and bind it.
 *
 * Only one port may be learning at a time. A captured triple that is
 * already bound elsewhere is rebound to the learning port (last write wins).
 */

import type { ControlEvent, PortRef, PortType } from "../types.js";
import type { BindingTable, BindResult } from "./bindings.js";
import { GraphError } from "./errors.js";
import type { Graph } from "./graph.js";

export type LearnState =
  | { state: "idle" }
  | {
      state: "learning";
      target: PortRef;
      portType: PortType;
      /** Only events from this source qualify, when set */
      sourceId?: string;
      startedAt: number;
    };

export interface LearnOptions {
  sourceId?: string;
}

/** Whether an event of this kind can drive a port of this type. */
export function qualifies(event: ControlEvent, portType: PortType): boolean {
  if (portType === "trigger") return event.kind === "trigger" && event.rawValue > 0;
  return event.kind === "continuous";
}

export class Learner {
  private current: LearnState = { state: "idle" };
  private readonly unsubscribe: () => void;

  constructor(
    private readonly graph: Graph,
    private readonly bindings: BindingTable,
    private readonly now: () => number = Date.now,
  ) {
    this.unsubscribe = graph.onStructuralChange((change) => {
      if (this.current.state !== "learning") return;
      const target = this.current.target;
      if (change.type === "node-removed" && change.node === target.node) {
        this.current = { state: "idle" };
      } else if (
        change.type === "config-changed" &&
        change.node === target.node &&
        change.removedPorts.includes(target.port)
      ) {
        this.current = { state: "idle" };
      }
    });
  }

  get status(): LearnState {
    return this.current;
  }

  /**
   * Enter learn mode for an input port.
   * @throws GraphError LearnInProgress | UnknownNode | UnknownPort | TypeMismatch
   */
  start(target: PortRef, options: LearnOptions = {}): LearnState {
    if (this.current.state === "learning") {
      const pending = this.current.target;
      throw new GraphError(
        "LearnInProgress",
        `Already learning for node ${pending.node} port "${pending.port}"; cancel it first`,
      );
    }
    const spec = this.graph.requirePort(target, "input");
    this.current = {
      state: "learning",
      target: { node: target.node, port: target.port },
      portType: spec.type,
      sourceId: options.sourceId,
      startedAt: this.now(),
    };
    return this.current;
  }

  /** @throws GraphError NotLearning */
  cancel(): void {
    if (this.current.state !== "learning") {
      throw new GraphError("NotLearning", "Learn mode is not active");
    }
    this.current = { state: "idle" };
  }

  /** Cancel a learn restricted to a source that is going away. */
  cancelForSource(sourceId: string): boolean {
    if (this.current.state === "learning" && this.current.sourceId === sourceId) {
      this.current = { state: "idle" };
      return true;
    }
    return false;
  }

  /**
   * Offer an incoming event. Returns the new binding when the event was
   * captured, or null when learn mode is idle or the event does not qualify.
   */
  offer(event: ControlEvent): BindResult | null {
    const current = this.current;
    if (current.state !== "learning") return null;
    if (current.sourceId !== undefined && event.sourceId !== current.sourceId) return null;
    if (!qualifies(event, current.portType)) return null;

    const result = this.bindings.bind(
      { device: event.device, channel: event.channel, controlId: event.controlId },
      current.target,
    );
    this.current = { state: "idle" };
    return result;
  }

  dispose(): void {
    this.unsubscribe();
  }
}
