/**
 * Binding table: (device, channel, controlId) → input port.
 *
 * One binding per control triple; binding a triple again replaces the
 * previous target. Bindings follow the graph: removing a node, or a
 * config change that drops a port, removes the bindings pointing at it.
 */

import type { Binding, ControlTriple, NodeId, PortRef } from "../types.js";
import type { Graph, StructuralChange } from "./graph.js";

export function tripleKey(triple: ControlTriple): string {
  return `${triple.device}\u0000${triple.channel}\u0000${triple.controlId}`;
}

export function formatTriple(triple: ControlTriple): string {
  return `${triple.device} ch${triple.channel} #${triple.controlId}`;
}

export interface BindResult {
  binding: Binding;
  /** The binding this one replaced, when the triple was already bound elsewhere */
  replaced?: Binding;
}

export class BindingTable {
  private readonly byTriple = new Map<string, Binding>();
  private readonly unsubscribe: () => void;

  constructor(private readonly graph: Graph) {
    this.unsubscribe = graph.onStructuralChange((change) => this.onGraphChange(change));
  }

  /**
   * Bind a control triple to an input port, replacing any prior target.
   * @throws GraphError UnknownNode | UnknownPort | TypeMismatch
   */
  bind(triple: ControlTriple, target: PortRef): BindResult {
    this.graph.requirePort(target, "input");
    const key = tripleKey(triple);
    const previous = this.byTriple.get(key);
    const binding: Binding = {
      device: triple.device,
      channel: triple.channel,
      controlId: triple.controlId,
      target: { node: target.node, port: target.port },
    };
    this.byTriple.set(key, binding);
    const replaced =
      previous && (previous.target.node !== target.node || previous.target.port !== target.port)
        ? previous
        : undefined;
    return { binding, replaced };
  }

  /** @returns true when a binding was removed */
  unbind(triple: ControlTriple): boolean {
    return this.byTriple.delete(tripleKey(triple));
  }

  resolve(triple: ControlTriple): Binding | undefined {
    return this.byTriple.get(tripleKey(triple));
  }

  list(): Binding[] {
    return [...this.byTriple.values()].sort(
      (a, b) =>
        a.device.localeCompare(b.device) || a.channel - b.channel || a.controlId - b.controlId,
    );
  }

  forNode(id: NodeId): Binding[] {
    return this.list().filter((b) => b.target.node === id);
  }

  removeForNode(id: NodeId, ports?: ReadonlySet<string>): number {
    let removed = 0;
    for (const [key, binding] of this.byTriple) {
      if (binding.target.node !== id) continue;
      if (ports && !ports.has(binding.target.port)) continue;
      this.byTriple.delete(key);
      removed++;
    }
    return removed;
  }

  get size(): number {
    return this.byTriple.size;
  }

  clear(): void {
    this.byTriple.clear();
  }

  dispose(): void {
    this.unsubscribe();
  }

  private onGraphChange(change: StructuralChange): void {
    if (change.type === "node-removed") {
      this.removeForNode(change.node);
    } else if (change.type === "config-changed" && change.removedPorts.length > 0) {
      this.removeForNode(change.node, new Set(change.removedPorts));
    }
  }
}
