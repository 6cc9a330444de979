/**
 * Evaluation engine: the single dispatch loop.
 *
 * Events from every attached source are queued in arrival order and
 * handled one at a time:
 *   1. learn mode gets the first look; a captured event is consumed
 *   2. the binding table resolves the target input port (unbound → dropped)
 *   3. the input is written and the cached topological order is walked
 *      from that node, evaluating each touched node exactly once
 *   4. every evaluated terminal action node is handed to the dispatcher
 *
 * Steps 1–3 run synchronously inside one turn, so graph edits can never
 * be observed half-applied. Step 4 does not wait for the action.
 */

import type { ActionDispatcher, Activation, EventContext } from "../actions/types.js";
import type { Diagnostics } from "../runtime/diagnostics.js";
import type { Logger } from "../runtime/logger.js";
import { silentLogger } from "../runtime/logger.js";
import type { EventSource } from "../sources/types.js";
import type { Binding, ControlEvent, NodeId, PortType, PortValue } from "../types.js";
import type { BindingTable } from "./bindings.js";
import type { Graph } from "./graph.js";
import type { Learner } from "./learner.js";
import { type ActionKind, actionVariantOf, evaluateNode } from "./node-kinds.js";

export interface ActivationRecord {
  node: NodeId;
  kind: ActionKind;
  inputs: Record<string, PortValue>;
}

export interface DispatchResult {
  status: "dropped" | "learned" | "evaluated";
  /** Why the event was dropped */
  reason?: string;
  /** Nodes evaluated, in evaluation order */
  evaluated: NodeId[];
  activations: ActivationRecord[];
  /** The binding that routed (or, for learned events, was created by) the event */
  binding?: Binding;
}

export interface EngineOptions {
  graph: Graph;
  bindings: BindingTable;
  learner: Learner;
  dispatcher: ActionDispatcher;
  diagnostics?: Diagnostics;
  logger?: Logger;
}

interface AttachedSource {
  source: EventSource;
  closing: boolean;
  done: Promise<void>;
}

export class Engine {
  private readonly graph: Graph;
  private readonly bindings: BindingTable;
  private readonly learner: Learner;
  private readonly dispatcher: ActionDispatcher;
  private readonly diagnostics?: Diagnostics;
  private readonly logger: Logger;

  private tail: Promise<unknown> = Promise.resolve();
  private queued = 0;
  private firings = 0;
  private readonly lastTimestamp = new Map<string, number>();
  private readonly sources = new Map<string, AttachedSource>();

  constructor(options: EngineOptions) {
    this.graph = options.graph;
    this.bindings = options.bindings;
    this.learner = options.learner;
    this.dispatcher = options.dispatcher;
    this.diagnostics = options.diagnostics;
    this.logger = options.logger ?? silentLogger;
  }

  /** Events waiting for the dispatch loop, including the one in progress. */
  get pending(): number {
    return this.queued;
  }

  /**
   * Queue an event. Resolves after the event has been evaluated and its
   * actions dispatched, not after the actions finish.
   */
  deliver(event: ControlEvent): Promise<DispatchResult> {
    this.queued++;
    const run = this.tail.then(() => {
      try {
        return this.dispatch(event);
      } catch (error) {
        this.logger.error("dispatch failed", { error, device: event.device });
        return this.drop(event, `internal error: ${error instanceof Error ? error.message : String(error)}`);
      } finally {
        this.queued--;
      }
    });
    this.tail = run;
    return run;
  }

  // -------------------------------------------------------------------------
  // Sources
  // -------------------------------------------------------------------------

  /** Start consuming a source. Its events join the dispatch loop in arrival order. */
  attach(source: EventSource): void {
    if (this.sources.has(source.id)) {
      throw new Error(`source "${source.id}" is already attached`);
    }
    const entry: AttachedSource = { source, closing: false, done: Promise.resolve() };
    this.sources.set(source.id, entry);
    entry.done = this.consume(entry);
    this.logger.info(`attached source ${source.id}`);
  }

  /**
   * Close a source. Cancels a learn waiting on it and drops its future events.
   * @returns false when no such source is attached
   */
  async detach(sourceId: string): Promise<boolean> {
    const entry = this.sources.get(sourceId);
    if (!entry) return false;
    entry.closing = true;
    this.learner.cancelForSource(sourceId);
    await entry.source.close();
    await entry.done;
    return true;
  }

  attachedSources(): string[] {
    return [...this.sources.keys()];
  }

  /** Resolves once the queue is drained and every dispatched action has settled. */
  async settle(): Promise<void> {
    await this.tail;
    await this.dispatcher.idle();
  }

  /** Detach every source, then settle. */
  async close(): Promise<void> {
    await Promise.all([...this.sources.keys()].map((id) => this.detach(id)));
    await this.settle();
  }

  private async consume(entry: AttachedSource): Promise<void> {
    const { source } = entry;
    try {
      for await (const event of source.events()) {
        if (entry.closing) break;
        await this.deliver({ ...event, sourceId: source.id });
      }
    } catch (error) {
      this.logger.error(`source ${source.id} failed`, { error });
    } finally {
      this.sources.delete(source.id);
      this.learner.cancelForSource(source.id);
      this.logger.info(`detached source ${source.id}`);
    }
  }

  // -------------------------------------------------------------------------
  // Evaluation
  // -------------------------------------------------------------------------

  private dispatch(incoming: ControlEvent): DispatchResult {
    const event = this.orderTimestamp(incoming);

    const learned = this.learner.offer(event);
    if (learned) {
      this.diagnostics?.reportLearned(learned);
      return { status: "learned", evaluated: [], activations: [], binding: learned.binding };
    }

    const binding = this.bindings.resolve(event);
    if (!binding) return this.drop(event, "unbound control");

    const node = this.graph.getNode(binding.target.node);
    const spec = node
      ? this.graph.ports(node.id).find((p) => p.direction === "input" && p.name === binding.target.port)
      : undefined;
    if (!node || !spec) return this.drop(event, "binding target no longer exists");

    const value = this.inputValue(event, spec.type);
    if (value === undefined) return this.drop(event, "trigger released");

    node.inputs.set(spec.name, value);
    return { ...this.propagate(node.id, spec.name, event), binding };
  }

  /** Value written to a bound input, or undefined when the event does not fire it. */
  private inputValue(event: ControlEvent, type: PortType): PortValue | undefined {
    switch (type) {
      case "number":
        return event.rawValue;
      case "string":
        return String(event.rawValue);
      case "trigger":
        if (event.kind === "continuous" && event.rawValue <= 0) return undefined;
        return ++this.firings;
    }
  }

  private propagate(start: NodeId, port: string, event: ControlEvent): DispatchResult {
    const touched = new Map<NodeId, Set<string>>([[start, new Set([port])]]);
    const evaluated: NodeId[] = [];
    const activations: ActivationRecord[] = [];

    const order = this.graph.topologicalOrder();
    for (let i = order.indexOf(start); i >= 0 && i < order.length; i++) {
      const id = order[i];
      const inputs = touched.get(id);
      if (!inputs) continue;
      const node = this.graph.requireNode(id);

      const outputs = evaluateNode(node, node.inputs, inputs);
      evaluated.push(id);

      for (const [name, value] of outputs) {
        node.outputs.set(name, value);
        for (const edge of this.graph.outgoing(id)) {
          if (edge.from.port !== name) continue;
          const target = this.graph.requireNode(edge.to.node);
          target.inputs.set(edge.to.port, value);
          const ports = touched.get(edge.to.node) ?? new Set<string>();
          ports.add(edge.to.port);
          touched.set(edge.to.node, ports);
        }
      }

      const variant = actionVariantOf(node);
      if (variant && this.graph.isTerminal(id)) {
        const activation: Activation = {
          node: id,
          title: node.title,
          variant,
          inputs: Object.fromEntries(node.inputs),
          eventContext: this.eventContext(event, id, node.title),
        };
        this.dispatcher.submit(activation);
        activations.push({ node: id, kind: variant.kind, inputs: { ...activation.inputs } });
      }
    }

    return { status: "evaluated", evaluated, activations };
  }

  private eventContext(event: ControlEvent, nodeId: NodeId, nodeTitle: string): EventContext {
    return {
      device: event.device,
      channel: event.channel,
      controlId: event.controlId,
      rawValue: event.rawValue,
      kind: event.kind,
      timestamp: event.timestamp,
      nodeId,
      nodeTitle,
    };
  }

  /** Clamp a timestamp that goes backwards for its device. */
  private orderTimestamp(event: ControlEvent): ControlEvent {
    const last = this.lastTimestamp.get(event.device);
    if (last !== undefined && event.timestamp < last) {
      this.logger.warn(`timestamp went backwards for ${event.device}`, { last, got: event.timestamp });
      return { ...event, timestamp: last };
    }
    this.lastTimestamp.set(event.device, event.timestamp);
    return event;
  }

  private drop(event: ControlEvent, reason: string): DispatchResult {
    this.diagnostics?.reportDropped(event, reason);
    return { status: "dropped", reason, evaluated: [], activations: [] };
  }
}
