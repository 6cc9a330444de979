/**
 * Diagnostics: the asynchronous sink for action reports, dropped events
 * and learned bindings.
 *
 * Keeps the most recent action reports in a bounded ring so a client can
 * inspect failures after the fact.
 */

import { EventEmitter } from "node:events";

import type { ActionReport } from "../actions/types.js";
import type { BindResult } from "../core/bindings.js";
import type { ControlEvent } from "../types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export interface DiagnosticsEventMap {
  action: ActionReport;
  dropped: { event: ControlEvent; reason: string };
  learned: BindResult;
}

export type DiagnosticsEvent = keyof DiagnosticsEventMap;

export const DEFAULT_HISTORY = 100;

export class Diagnostics {
  private readonly emitter = new EventEmitter();
  private readonly history: ActionReport[] = [];

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly capacity: number = DEFAULT_HISTORY,
  ) {}

  on<E extends DiagnosticsEvent>(event: E, listener: (payload: DiagnosticsEventMap[E]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  reportAction(report: ActionReport): void {
    this.history.push(report);
    if (this.history.length > this.capacity) this.history.shift();

    const { outcome } = report;
    if (outcome.ok) {
      this.logger.debug(`${report.kind} node ${report.node} ok`, {
        detail: outcome.detail,
        durationMs: report.durationMs,
      });
    } else {
      this.logger.warn(`${report.kind} node ${report.node} failed (${outcome.reason}): ${outcome.message}`, {
        durationMs: report.durationMs,
        stderr: outcome.stderr || undefined,
      });
    }
    this.emitter.emit("action", report);
  }

  reportDropped(event: ControlEvent, reason: string): void {
    this.logger.debug(`dropped ${event.device} ch${event.channel} #${event.controlId}: ${reason}`);
    this.emitter.emit("dropped", { event, reason });
  }

  reportLearned(result: BindResult): void {
    const { binding, replaced } = result;
    this.logger.info(
      `learned ${binding.device} ch${binding.channel} #${binding.controlId} → node ${binding.target.node}.${binding.target.port}`,
      replaced ? { replaced: replaced.target } : undefined,
    );
    this.emitter.emit("learned", result);
  }

  /** Most recent action reports, oldest first. */
  recent(limit = this.capacity): ActionReport[] {
    return this.history.slice(-limit);
  }

  failures(limit = this.capacity): ActionReport[] {
    return this.history.filter((r) => !r.outcome.ok).slice(-limit);
  }
}
