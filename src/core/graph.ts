/**
 * Graph model: an arena of nodes and edges with integer ids.
 *
 * Invariants held by every mutation:
 *   - an edge joins an output port to an input port of the same type
 *   - an input port has at most one incoming edge
 *   - nodes and edges form a DAG (checked before an edge is inserted)
 *
 * A rejected mutation throws a GraphError and leaves the graph unchanged.
 */

import type { Edge, EdgeId, NodeId, PortRef, PortSpec, PortValue } from "../types.js";
import { GraphError } from "./errors.js";
import { type NodeKind, type NodeVariant, parseNodeConfig, portsOf } from "./node-kinds.js";

export type GraphNode = NodeVariant & {
  readonly id: NodeId;
  title: string;
  /** Creation sequence; breaks ties in topological order */
  readonly order: number;
  /** Editor layout position, carried through snapshots untouched */
  position?: [number, number];
  /** Current value cache per input port */
  readonly inputs: Map<string, PortValue>;
  /** Current value cache per output port */
  readonly outputs: Map<string, PortValue>;
};

export interface NodeOptions {
  title?: string;
  position?: [number, number];
}

export type StructuralChange =
  | { type: "node-added"; node: NodeId }
  | { type: "node-removed"; node: NodeId }
  | { type: "edge-added"; edge: Edge }
  | { type: "edge-removed"; edge: Edge }
  | { type: "config-changed"; node: NodeId; removedPorts: string[] };

export type StructuralListener = (change: StructuralChange) => void;

function portKey(ref: PortRef): string {
  return `${ref.node}:${ref.port}`;
}

export class Graph {
  private readonly nodeMap = new Map<NodeId, GraphNode>();
  private readonly edgeMap = new Map<EdgeId, Edge>();
  /** Edges leaving each node */
  private readonly outgoingEdges = new Map<NodeId, Set<EdgeId>>();
  /** The single edge feeding each occupied input port, keyed "node:port" */
  private readonly incomingByPort = new Map<string, EdgeId>();
  private readonly listeners = new Set<StructuralListener>();

  private nextNodeId = 1;
  private nextEdgeId = 1;
  private nextOrder = 0;
  private cachedOrder: readonly NodeId[] | null = null;

  // -------------------------------------------------------------------------
  // Nodes
  // -------------------------------------------------------------------------

  /**
   * Create a node of `kind`.
   * @throws GraphError InvalidConfig
   */
  addNode(kind: NodeKind, config: unknown, options: NodeOptions = {}): NodeId {
    const variant = parseNodeConfig(kind, config);
    const id = this.nextNodeId++;
    this.insertNode(id, variant, options);
    return id;
  }

  /**
   * Re-create a node under a known id, as snapshot loading does.
   * @throws GraphError InvalidSnapshot if the id is taken
   */
  restoreNode(id: NodeId, kind: NodeKind, config: unknown, options: NodeOptions = {}): void {
    if (this.nodeMap.has(id)) {
      throw new GraphError("InvalidSnapshot", `Duplicate node id ${id}`);
    }
    const variant = parseNodeConfig(kind, config);
    this.nextNodeId = Math.max(this.nextNodeId, id + 1);
    this.insertNode(id, variant, options);
  }

  private insertNode(id: NodeId, variant: NodeVariant, options: NodeOptions): void {
    const node: GraphNode = {
      ...variant,
      id,
      title: options.title ?? variant.kind,
      order: this.nextOrder++,
      position: options.position,
      inputs: new Map(),
      outputs: new Map(),
    };
    this.nodeMap.set(id, node);
    this.outgoingEdges.set(id, new Set());
    this.structuralChange({ type: "node-added", node: id });
  }

  /**
   * Replace a node's configuration.
   *
   * Bindings to ports the new config drops are cascaded by their owners;
   * dropping a port that still has an edge is rejected.
   * @throws GraphError UnknownNode | InvalidConfig
   */
  updateNodeConfig(id: NodeId, config: unknown, options: NodeOptions = {}): void {
    const current = this.requireNode(id);
    const variant = parseNodeConfig(current.kind, config);

    const nextPorts = portsOf(variant);
    const keeps = (spec: PortSpec) =>
      nextPorts.some((p) => p.name === spec.name && p.direction === spec.direction && p.type === spec.type);

    for (const edge of this.edgesTouching(id)) {
      const end = edge.from.node === id ? edge.from : edge.to;
      const direction = edge.from.node === id ? "output" : "input";
      const spec = portsOf(current).find((p) => p.name === end.port && p.direction === direction);
      if (spec && !keeps(spec)) {
        throw new GraphError(
          "InvalidConfig",
          `Port "${end.port}" on node ${id} is still connected (edge ${edge.id}); disconnect it first`,
        );
      }
    }

    const removedPorts = portsOf(current)
      .filter((spec) => spec.direction === "input" && !keeps(spec))
      .map((spec) => spec.name);

    const node: GraphNode = {
      ...variant,
      id,
      title: options.title ?? current.title,
      order: current.order,
      position: options.position ?? current.position,
      inputs: current.inputs,
      outputs: current.outputs,
    };
    for (const name of [...node.inputs.keys()]) {
      if (!nextPorts.some((p) => p.direction === "input" && p.name === name)) node.inputs.delete(name);
    }
    for (const name of [...node.outputs.keys()]) {
      if (!nextPorts.some((p) => p.direction === "output" && p.name === name)) node.outputs.delete(name);
    }
    this.nodeMap.set(id, node);
    this.structuralChange({ type: "config-changed", node: id, removedPorts });
  }

  /**
   * Delete a node and every edge touching it.
   * @throws GraphError UnknownNode
   */
  removeNode(id: NodeId): void {
    this.requireNode(id);
    for (const edge of this.edgesTouching(id)) {
      this.deleteEdge(edge);
    }
    this.nodeMap.delete(id);
    this.outgoingEdges.delete(id);
    this.structuralChange({ type: "node-removed", node: id });
  }

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  /** @throws GraphError UnknownNode */
  requireNode(id: NodeId): GraphNode {
    const node = this.nodeMap.get(id);
    if (!node) {
      throw new GraphError("UnknownNode", `Node ${id} does not exist`);
    }
    return node;
  }

  /** Nodes in creation order. */
  nodes(): GraphNode[] {
    return [...this.nodeMap.values()].sort((a, b) => a.order - b.order);
  }

  get size(): number {
    return this.nodeMap.size;
  }

  ports(id: NodeId): PortSpec[] {
    return portsOf(this.requireNode(id));
  }

  /**
   * Look up a port spec by name and direction.
   * @throws GraphError UnknownNode | UnknownPort
   */
  requirePort(ref: PortRef, direction: PortSpec["direction"]): PortSpec {
    const specs = this.ports(ref.node);
    const spec = specs.find((p) => p.name === ref.port && p.direction === direction);
    if (spec) return spec;
    if (specs.some((p) => p.name === ref.port)) {
      throw new GraphError(
        "TypeMismatch",
        `Port "${ref.port}" on node ${ref.node} is not an ${direction} port`,
      );
    }
    throw new GraphError(
      "UnknownPort",
      `Node ${ref.node} has no port "${ref.port}". Available: ${specs.map((p) => p.name).join(", ")}`,
    );
  }

  // -------------------------------------------------------------------------
  // Edges
  // -------------------------------------------------------------------------

  /**
   * Connect an output port to an input port.
   * @throws GraphError UnknownNode | UnknownPort | TypeMismatch | PortOccupied | CycleDetected
   */
  connect(from: PortRef, to: PortRef): EdgeId {
    this.checkConnection(from, to);
    const id = this.nextEdgeId++;
    this.insertEdge({ id, from: { ...from }, to: { ...to } });
    return id;
  }

  /**
   * Re-create an edge under a known id, as snapshot loading does.
   * @throws GraphError on any structural violation, or InvalidSnapshot if the id is taken
   */
  restoreEdge(id: EdgeId, from: PortRef, to: PortRef): void {
    if (this.edgeMap.has(id)) {
      throw new GraphError("InvalidSnapshot", `Duplicate edge id ${id}`);
    }
    this.checkConnection(from, to);
    this.nextEdgeId = Math.max(this.nextEdgeId, id + 1);
    this.insertEdge({ id, from: { ...from }, to: { ...to } });
  }

  /** @throws GraphError UnknownEdge */
  disconnect(id: EdgeId): void {
    const edge = this.edgeMap.get(id);
    if (!edge) {
      throw new GraphError("UnknownEdge", `Edge ${id} does not exist`);
    }
    this.deleteEdge(edge);
  }

  private checkConnection(from: PortRef, to: PortRef): void {
    const source = this.requirePort(from, "output");
    const target = this.requirePort(to, "input");

    if (source.type !== target.type) {
      throw new GraphError(
        "TypeMismatch",
        `Cannot connect ${source.type} output "${from.port}" to ${target.type} input "${to.port}"`,
      );
    }
    const occupant = this.incomingByPort.get(portKey(to));
    if (occupant !== undefined) {
      throw new GraphError(
        "PortOccupied",
        `Input "${to.port}" on node ${to.node} already has an incoming edge (edge ${occupant})`,
      );
    }
    if (from.node === to.node || this.reaches(to.node, from.node)) {
      throw new GraphError(
        "CycleDetected",
        `Connecting node ${from.node} to node ${to.node} would create a cycle`,
      );
    }
  }

  private insertEdge(edge: Edge): void {
    this.edgeMap.set(edge.id, edge);
    this.outgoingEdges.get(edge.from.node)?.add(edge.id);
    this.incomingByPort.set(portKey(edge.to), edge.id);
    this.structuralChange({ type: "edge-added", edge });
  }

  private deleteEdge(edge: Edge): void {
    this.edgeMap.delete(edge.id);
    this.outgoingEdges.get(edge.from.node)?.delete(edge.id);
    this.incomingByPort.delete(portKey(edge.to));
    this.structuralChange({ type: "edge-removed", edge });
  }

  /** True when `target` is reachable from `start` along edges. */
  reaches(start: NodeId, target: NodeId): boolean {
    const stack = [start];
    const seen = new Set<NodeId>();
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      if (current === target) return true;
      seen.add(current);
      for (const edge of this.outgoing(current)) {
        stack.push(edge.to.node);
      }
    }
    return false;
  }

  getEdge(id: EdgeId): Edge | undefined {
    return this.edgeMap.get(id);
  }

  edges(): Edge[] {
    return [...this.edgeMap.values()].sort((a, b) => a.id - b.id);
  }

  outgoing(id: NodeId): Edge[] {
    const ids = this.outgoingEdges.get(id);
    if (!ids) return [];
    const result: Edge[] = [];
    for (const edgeId of ids) {
      const edge = this.edgeMap.get(edgeId);
      if (edge) result.push(edge);
    }
    return result;
  }

  incomingEdge(ref: PortRef): Edge | undefined {
    const id = this.incomingByPort.get(portKey(ref));
    return id === undefined ? undefined : this.edgeMap.get(id);
  }

  isTerminal(id: NodeId): boolean {
    return (this.outgoingEdges.get(id)?.size ?? 0) === 0;
  }

  private edgesTouching(id: NodeId): Edge[] {
    return this.edges().filter((edge) => edge.from.node === id || edge.to.node === id);
  }

  // -------------------------------------------------------------------------
  // Ordering
  // -------------------------------------------------------------------------

  /**
   * Node ids ordered so every edge's source precedes its destination.
   * Independent nodes keep creation order. Cached until the next structural change.
   */
  topologicalOrder(): readonly NodeId[] {
    if (this.cachedOrder) return this.cachedOrder;

    const inDegree = new Map<NodeId, number>();
    for (const node of this.nodeMap.values()) inDegree.set(node.id, 0);
    for (const edge of this.edgeMap.values()) {
      inDegree.set(edge.to.node, (inDegree.get(edge.to.node) ?? 0) + 1);
    }

    const byOrder = (a: NodeId, b: NodeId) => this.requireNode(a).order - this.requireNode(b).order;
    const ready = [...inDegree].filter(([, degree]) => degree === 0).map(([id]) => id).sort(byOrder);
    const order: NodeId[] = [];

    while (ready.length > 0) {
      const id = ready.shift();
      if (id === undefined) break;
      order.push(id);
      let released = false;
      for (const edge of this.outgoing(id)) {
        const remaining = (inDegree.get(edge.to.node) ?? 0) - 1;
        inDegree.set(edge.to.node, remaining);
        if (remaining === 0) {
          ready.push(edge.to.node);
          released = true;
        }
      }
      if (released) ready.sort(byOrder);
    }

    this.cachedOrder = order;
    return order;
  }

  // -------------------------------------------------------------------------
  // Change notification
  // -------------------------------------------------------------------------

  /** Subscribe to structural changes. Returns an unsubscribe function. */
  onStructuralChange(listener: StructuralListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Remove every node and edge. Id counters keep counting. */
  clear(): void {
    for (const node of this.nodes().reverse()) {
      this.removeNode(node.id);
    }
  }

  private structuralChange(change: StructuralChange): void {
    this.cachedOrder = null;
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
