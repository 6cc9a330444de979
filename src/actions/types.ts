/**
 * Action effector contract.
 *
 * Each action kind has an effector that receives the node's config, its
 * current input values and the triggering event context, and resolves to
 * an outcome. Effectors never throw for expected failures; they resolve
 * with `{ ok: false }` and a reason.
 */

import type { ActionKind, ActionVariant } from "../core/node-kinds.js";
import type { ControlEventKind, NodeId, PortValue } from "../types.js";

export type ActionFailureReason =
  | "timeout"
  | "exit"
  | "exception"
  | "not-found"
  | "spawn"
  | "rejected";

export interface ActionSuccess {
  ok: true;
  /** Short human-readable summary of what happened */
  detail?: string;
  stdout?: string;
  stderr?: string;
  /** Lines a script wrote through context.log */
  logs?: string[];
  /** Value a script passed to context.setResult or returned */
  result?: unknown;
}

export interface ActionFailure {
  ok: false;
  reason: ActionFailureReason;
  message: string;
  stdout?: string;
  stderr?: string;
  logs?: string[];
}

export type ActionOutcome = ActionSuccess | ActionFailure;

/** The event that caused an activation, plus the node it reached. */
export interface EventContext {
  device: string;
  channel: number;
  controlId: number;
  rawValue: number;
  kind: ControlEventKind;
  timestamp: number;
  nodeId: NodeId;
  nodeTitle: string;
}

export type ActionInputs = Readonly<Record<string, PortValue>>;

export interface ActionRequest<C> {
  config: C;
  inputs: ActionInputs;
  eventContext: EventContext;
  /** Aborted when the invocation times out; effectors stop their work on abort */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface ActionEffector<C> {
  execute(request: ActionRequest<C>): Promise<ActionOutcome>;
}

/** One terminal node activation, handed from the engine to the sandbox. */
export interface Activation {
  node: NodeId;
  title: string;
  variant: ActionVariant;
  inputs: ActionInputs;
  eventContext: EventContext;
}

export interface ActionReport {
  node: NodeId;
  title: string;
  kind: ActionKind;
  outcome: ActionOutcome;
  startedAt: number;
  durationMs: number;
}

/** Where the engine sends activations; the sandbox in production, a recorder in tests. */
export interface ActionDispatcher {
  submit(activation: Activation): void;
  /** Resolves once every submitted activation has settled. */
  idle(): Promise<void>;
}
