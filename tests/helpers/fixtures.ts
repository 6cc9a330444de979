import type {
  ActionDispatcher,
  ActionInputs,
  ActionRequest,
  Activation,
  EventContext,
} from "../../src/actions/types.js";
import type { ControlEvent } from "../../src/types.js";

/** Dispatcher that records activations instead of running them. */
export class RecordingDispatcher implements ActionDispatcher {
  readonly activations: Activation[] = [];

  submit(activation: Activation): void {
    this.activations.push(activation);
  }

  async idle(): Promise<void> {}
}

let clock = 1_000;

export function cc(controlId: number, rawValue: number, overrides: Partial<ControlEvent> = {}): ControlEvent {
  return {
    device: "test-deck",
    channel: 1,
    controlId,
    rawValue,
    kind: "continuous",
    timestamp: clock++,
    ...overrides,
  };
}

export function note(controlId: number, velocity = 127, overrides: Partial<ControlEvent> = {}): ControlEvent {
  return cc(controlId, velocity, { kind: "trigger", ...overrides });
}

export const eventContext: EventContext = {
  device: "test-deck",
  channel: 1,
  controlId: 7,
  rawValue: 64,
  kind: "continuous",
  timestamp: 1_000,
  nodeId: 3,
  nodeTitle: "Under Test",
};

export function actionRequest<C>(
  config: C,
  inputs: ActionInputs = {},
  options: { signal?: AbortSignal; timeoutMs?: number } = {},
): ActionRequest<C> {
  return {
    config,
    inputs,
    eventContext,
    signal: options.signal ?? new AbortController().signal,
    timeoutMs: options.timeoutMs ?? 5_000,
  };
}
