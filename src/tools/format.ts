/**
 * Plain-text renderings shared by the tool handlers.
 */

import type { ActionReport } from "../actions/types.js";
import type { BindingTable } from "../core/bindings.js";
import { formatTriple } from "../core/bindings.js";
import type { DispatchResult } from "../core/engine.js";
import type { Graph, GraphNode } from "../core/graph.js";
import type { Profile } from "../core/profiles.js";
import type { Binding, Edge, PortRef, PortSpec, PortValue } from "../types.js";

export function formatPortRef(ref: PortRef): string {
  return `${ref.node}.${ref.port}`;
}

export function formatValue(value: PortValue | undefined): string {
  if (value === undefined) return "-";
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

function formatPorts(specs: PortSpec[], values: ReadonlyMap<string, PortValue>): string {
  return specs.map((p) => `${p.name}:${p.type}=${formatValue(values.get(p.name))}`).join(", ");
}

export function formatNode(graph: Graph, node: GraphNode): string {
  const ports = graph.ports(node.id);
  const inputs = ports.filter((p) => p.direction === "input");
  const outputs = ports.filter((p) => p.direction === "output");
  const lines = [`#${node.id} ${node.title} [${node.kind}]`];
  if (inputs.length > 0) lines.push(`  in:  ${formatPorts(inputs, node.inputs)}`);
  if (outputs.length > 0) lines.push(`  out: ${formatPorts(outputs, node.outputs)}`);
  lines.push(`  config: ${JSON.stringify(node.config)}`);
  return lines.join("\n");
}

export function formatEdge(edge: Edge): string {
  return `edge ${edge.id}: ${formatPortRef(edge.from)} → ${formatPortRef(edge.to)}`;
}

export function formatBinding(binding: Binding): string {
  return `${formatTriple(binding)} → ${formatPortRef(binding.target)}`;
}

export function formatGraph(graph: Graph, bindings: BindingTable): string {
  if (graph.size === 0) return "Graph is empty.";
  const order = graph.topologicalOrder().join(" → ");
  const sections = [
    `Nodes (${graph.size}):`,
    ...graph.nodes().map((n) => formatNode(graph, n)),
    "",
    `Edges (${graph.edges().length}):`,
    ...graph.edges().map((e) => `  ${formatEdge(e)}`),
    "",
    `Bindings (${bindings.size}):`,
    ...bindings.list().map((b) => `  ${formatBinding(b)}`),
    "",
    `Evaluation order: ${order}`,
  ];
  return sections.join("\n");
}

export function formatReport(report: ActionReport): string {
  const head = `${report.kind} #${report.node} ${report.title}`;
  const { outcome } = report;
  const lines = outcome.ok
    ? [`${head}: ok (${report.durationMs}ms)${outcome.detail ? ` ${outcome.detail}` : ""}`]
    : [`${head}: ${outcome.reason} (${report.durationMs}ms) ${outcome.message}`];
  if (outcome.stdout) lines.push(`  stdout: ${outcome.stdout.trimEnd()}`);
  if (outcome.stderr) lines.push(`  stderr: ${outcome.stderr.trimEnd()}`);
  for (const line of outcome.logs ?? []) lines.push(`  log: ${line}`);
  if (outcome.ok && outcome.result !== undefined) lines.push(`  result: ${JSON.stringify(outcome.result)}`);
  return lines.join("\n");
}

export function formatDispatch(result: DispatchResult, reports: ActionReport[] = []): string {
  switch (result.status) {
    case "dropped":
      return `Dropped: ${result.reason ?? "unknown reason"}`;
    case "learned":
      return result.binding ? `Learned: ${formatBinding(result.binding)}` : "Learned";
  }
  const lines = [
    `Routed via ${result.binding ? formatBinding(result.binding) : "binding"}`,
    `Evaluated: ${result.evaluated.map((id) => `#${id}`).join(", ")}`,
  ];
  if (result.activations.length === 0) {
    lines.push("No actions triggered.");
  }
  for (const activation of result.activations) {
    const inputs = Object.entries(activation.inputs)
      .map(([name, value]) => `${name}=${formatValue(value)}`)
      .join(", ");
    lines.push(`Activated ${activation.kind} #${activation.node} (${inputs})`);
  }
  for (const report of reports) lines.push(formatReport(report));
  return lines.join("\n");
}

export function formatProfile(profile: Profile): string {
  return `${profile.id}: ${profile.name} (${profile.entries.length} entries)`;
}
