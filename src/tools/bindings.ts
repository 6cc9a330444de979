/**
 * Binding and learn-mode tools.
 */

import type { BindingTable } from "../core/bindings.js";
import { formatTriple } from "../core/bindings.js";
import type { Learner, LearnState } from "../core/learner.js";
import type { ControlTriple } from "../types.js";
import type { BindInput } from "../schemas/bindings.js";
import { formatBinding, formatPortRef } from "./format.js";

export function executeBind(bindings: BindingTable, input: BindInput): string {
  const { binding, replaced } = bindings.bind(input, { node: input.node, port: input.port });
  const lines = [`Bound ${formatBinding(binding)}`];
  if (replaced) lines.push(`  (was → ${formatPortRef(replaced.target)})`);
  return lines.join("\n");
}

export function executeUnbind(bindings: BindingTable, triple: ControlTriple): string {
  return bindings.unbind(triple)
    ? `Unbound ${formatTriple(triple)}`
    : `No binding for ${formatTriple(triple)}`;
}

export function executeListBindings(bindings: BindingTable, node?: number): string {
  const list = node === undefined ? bindings.list() : bindings.forNode(node);
  if (list.length === 0) return "No bindings.";
  return [`Bindings (${list.length}):`, ...list.map((b) => `  ${formatBinding(b)}`)].join("\n");
}

export function formatLearnState(state: LearnState, now: number = Date.now()): string {
  if (state.state === "idle") return "Learn mode: idle";
  const source = state.sourceId ? ` from ${state.sourceId}` : "";
  const waiting = Math.max(0, Math.round((now - state.startedAt) / 1000));
  return (
    `Learn mode: waiting for a ${state.portType === "trigger" ? "button" : "continuous control"}${source} ` +
    `→ ${formatPortRef(state.target)} (${waiting}s)`
  );
}

export function executeStartLearning(
  learner: Learner,
  input: { node: number; port: string; sourceId?: string },
): string {
  const state = learner.start({ node: input.node, port: input.port }, { sourceId: input.sourceId });
  return `${formatLearnState(state)}\nMove a control to bind it.`;
}

export function executeCancelLearning(learner: Learner): string {
  learner.cancel();
  return "Learn mode cancelled.";
}
