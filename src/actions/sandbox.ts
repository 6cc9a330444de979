/**
 * Action sandbox: runs terminal node activations off the dispatch loop.
 *
 * Every activation is queued onto a bounded pool and given a wall-clock
 * timeout. On timeout the effector's signal is aborted and the outcome is
 * a timeout failure, reported once the effector has stopped or the grace
 * period has passed, whichever comes first. Outcomes go to Diagnostics;
 * nothing here throws back into the engine.
 *
 * Continuous activations that have not started yet are coalesced per node:
 * a newer one replaces the waiting one, so a fader sweep runs at most one
 * queued update per node. Trigger activations always run.
 */

import type { ScriptConfig, ShellCommandConfig, VolumeConfig } from "../core/node-kinds.js";
import type { Diagnostics } from "../runtime/diagnostics.js";
import type { Logger } from "../runtime/logger.js";
import type { NodeId } from "../types.js";
import { silentLogger } from "../runtime/logger.js";
import type { WorkerPool } from "./pool.js";
import type {
  ActionDispatcher,
  ActionEffector,
  ActionOutcome,
  ActionReport,
  Activation,
} from "./types.js";

export interface Effectors {
  Volume: ActionEffector<VolumeConfig>;
  ShellCommand: ActionEffector<ShellCommandConfig>;
  Script: ActionEffector<ScriptConfig>;
}

export interface SandboxOptions {
  pool: WorkerPool;
  effectors: Effectors;
  diagnostics: Diagnostics;
  /** Used when a node does not set its own timeoutMs */
  defaultTimeoutMs: number;
  /** How long a timed-out effector may keep its pool slot while it stops */
  graceMs: number;
  logger?: Logger;
  now?: () => number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ActionSandbox implements ActionDispatcher {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly waiting = new Map<NodeId, Activation>();

  constructor(private readonly options: SandboxOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /** Queue an activation. Returns immediately; the report arrives through Diagnostics. */
  submit(activation: Activation): void {
    const coalesce = activation.eventContext.kind === "continuous";
    if (coalesce) {
      const queued = this.waiting.has(activation.node);
      this.waiting.set(activation.node, activation);
      if (queued) {
        this.logger.debug(`coalesced waiting activation for node ${activation.node}`);
        return;
      }
    }
    this.options.pool
      .run(() => this.execute(coalesce ? this.takeWaiting(activation) : activation))
      .then((report) => this.options.diagnostics.reportAction(report))
      .catch((error: unknown) => {
        this.logger.error(`sandbox failed to run node ${activation.node}`, { error });
      });
  }

  idle(): Promise<void> {
    return this.options.pool.idle();
  }

  /** Run one activation to completion or timeout. Never rejects. */
  async execute(activation: Activation): Promise<ActionReport> {
    const timeoutMs = activation.variant.config.timeoutMs ?? this.options.defaultTimeoutMs;
    const controller = new AbortController();
    const startedAt = this.now();

    const work = this.invoke(activation, controller.signal, timeoutMs).catch(
      (error: unknown): ActionOutcome => ({
        ok: false,
        reason: "exception",
        message: error instanceof Error ? error.message : String(error),
      }),
    );

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<ActionOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: "timeout", message: `timed out after ${timeoutMs}ms` });
      }, timeoutMs);
    });

    const outcome = await Promise.race([work, expired]);
    clearTimeout(timer);

    const report: ActionReport = {
      node: activation.node,
      title: activation.title,
      kind: activation.variant.kind,
      outcome,
      startedAt,
      durationMs: this.now() - startedAt,
    };

    if (controller.signal.aborted) {
      // Hold the slot until the effector has stopped, or the grace period ends.
      await Promise.race([work, delay(this.options.graceMs)]);
    }
    return report;
  }

  private takeWaiting(submitted: Activation): Activation {
    const latest = this.waiting.get(submitted.node) ?? submitted;
    this.waiting.delete(submitted.node);
    return latest;
  }

  private async invoke(activation: Activation, signal: AbortSignal, timeoutMs: number): Promise<ActionOutcome> {
    const { variant, inputs, eventContext } = activation;
    switch (variant.kind) {
      case "Volume":
        return this.options.effectors.Volume.execute({
          config: variant.config,
          inputs,
          eventContext,
          signal,
          timeoutMs,
        });
      case "ShellCommand":
        return this.options.effectors.ShellCommand.execute({
          config: variant.config,
          inputs,
          eventContext,
          signal,
          timeoutMs,
        });
      case "Script":
        return this.options.effectors.Script.execute({
          config: variant.config,
          inputs,
          eventContext,
          signal,
          timeoutMs,
        });
    }
  }
}
