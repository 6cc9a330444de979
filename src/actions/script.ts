/**
 * Script action: runs user JavaScript in a worker thread.
 *
 * Each invocation gets its own worker and a fresh vm context exposing
 * exactly three read-only globals:
 *   - `event`   the triggering control event
 *   - `node`    { id, title, kind, config, inputs } of the owning node
 *   - `context` log(), now(), setResult(), and readFile()/listDir()
 *               limited to the allow-listed directories
 *
 * The globals are built inside the vm context, so nothing a script can
 * reach leads back to `require`, `process` or the network. File access goes
 * through a string-only bridge that checks the allow-list. The worker is
 * what bounds a script in time and memory; on abort it is terminated.
 */

import path from "node:path";
import { Worker } from "node:worker_threads";
import { z } from "zod";

import { type ScriptConfig, wrapScriptSource } from "../core/node-kinds.js";
import type { Logger } from "../runtime/logger.js";
import { silentLogger } from "../runtime/logger.js";
import type { ActionEffector, ActionOutcome, ActionRequest } from "./types.js";

const WORKER_URL = new URL("./script-worker.cjs", import.meta.url);

const WorkerMessage = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), logs: z.array(z.string()), result: z.unknown() }),
  z.object({ ok: z.literal(false), message: z.string(), logs: z.array(z.string()) }),
]);

export interface ScriptActionOptions {
  /** Directories every script may read, on top of a node's own allowedPaths */
  allowedPaths?: string[];
  /** Heap limit per worker */
  memoryLimitMb?: number;
  logger?: Logger;
}

export class ScriptAction implements ActionEffector<ScriptConfig> {
  private readonly logger: Logger;

  constructor(private readonly options: ScriptActionOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  execute({ config, inputs, eventContext, signal, timeoutMs }: ActionRequest<ScriptConfig>): Promise<ActionOutcome> {
    const allowedPaths = [...(this.options.allowedPaths ?? []), ...(config.allowedPaths ?? [])].map((p) =>
      path.resolve(p),
    );

    return new Promise((resolve) => {
      let settled = false;
      const worker = new Worker(WORKER_URL, {
        workerData: {
          source: wrapScriptSource(config.source),
          event: {
            device: eventContext.device,
            channel: eventContext.channel,
            controlId: eventContext.controlId,
            rawValue: eventContext.rawValue,
            kind: eventContext.kind,
            timestamp: eventContext.timestamp,
          },
          node: {
            id: eventContext.nodeId,
            title: eventContext.nodeTitle,
            kind: "Script",
            config: { timeoutMs: config.timeoutMs ?? timeoutMs },
            inputs: { ...inputs },
          },
          allowedPaths,
        },
        resourceLimits: { maxOldGenerationSizeMb: this.options.memoryLimitMb ?? 64 },
        stdout: true,
        stderr: true,
      });

      const finish = (outcome: ActionOutcome) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      const stop = () => {
        worker.terminate().catch((error: unknown) => {
          this.logger.debug(`script worker for node ${eventContext.nodeId} did not terminate cleanly`, { error });
        });
      };

      const onAbort = () => {
        stop();
        finish({ ok: false, reason: "timeout", message: `script terminated after ${timeoutMs}ms` });
      };

      worker.once("message", (raw: unknown) => {
        const parsed = WorkerMessage.safeParse(raw);
        if (!parsed.success) {
          finish({ ok: false, reason: "exception", message: "script worker sent a malformed result" });
        } else if (parsed.data.ok) {
          finish({ ok: true, logs: parsed.data.logs, result: parsed.data.result, detail: "script completed" });
        } else {
          finish({ ok: false, reason: "exception", message: parsed.data.message, logs: parsed.data.logs });
        }
        stop();
      });
      worker.once("error", (error) => {
        finish({ ok: false, reason: "exception", message: error.message });
      });
      worker.once("exit", (code) => {
        finish({ ok: false, reason: "exception", message: `script worker exited with code ${code}` });
      });

      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
