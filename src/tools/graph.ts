/**
 * Graph editing tools: add_node, update_node, remove_node, connect,
 * disconnect, describe_graph.
 */

import type { BindingTable } from "../core/bindings.js";
import type { Graph } from "../core/graph.js";
import type { AddNodeInput, ConnectInput, UpdateNodeInput } from "../schemas/graph.js";
import { formatEdge, formatGraph, formatNode } from "./format.js";

export function executeAddNode(graph: Graph, input: AddNodeInput): string {
  const id = graph.addNode(input.kind, input.config, { title: input.title, position: input.position });
  return `Added node\n${formatNode(graph, graph.requireNode(id))}`;
}

export function executeUpdateNode(graph: Graph, input: UpdateNodeInput): string {
  const node = graph.requireNode(input.node);
  graph.updateNodeConfig(input.node, input.config ?? node.config, {
    title: input.title,
    position: input.position,
  });
  return `Updated node\n${formatNode(graph, graph.requireNode(input.node))}`;
}

export function executeRemoveNode(graph: Graph, bindings: BindingTable, id: number): string {
  const node = graph.requireNode(id);
  const edges = graph.edges().filter((e) => e.from.node === id || e.to.node === id).length;
  const bound = bindings.forNode(id).length;
  graph.removeNode(id);
  return `Removed node #${id} ${node.title} (${edges} edges, ${bound} bindings)`;
}

export function executeConnect(graph: Graph, input: ConnectInput): string {
  const id = graph.connect(
    { node: input.fromNode, port: input.fromPort },
    { node: input.toNode, port: input.toPort },
  );
  const edge = graph.getEdge(id);
  return edge ? `Connected ${formatEdge(edge)}` : `Connected edge ${id}`;
}

export function executeDisconnect(graph: Graph, id: number): string {
  const edge = graph.getEdge(id);
  graph.disconnect(id);
  return edge ? `Disconnected ${formatEdge(edge)}` : `Disconnected edge ${id}`;
}

export function executeDescribeGraph(graph: Graph, bindings: BindingTable, id?: number): string {
  if (id === undefined) return formatGraph(graph, bindings);
  const node = graph.requireNode(id);
  const edges = graph.edges().filter((e) => e.from.node === id || e.to.node === id);
  return [
    formatNode(graph, node),
    ...edges.map((e) => `  ${formatEdge(e)}`),
    ...bindings.forNode(id).map((b) => `  bound: ${b.device} ch${b.channel} #${b.controlId} → ${b.target.port}`),
  ].join("\n");
}
