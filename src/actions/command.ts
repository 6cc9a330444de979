/**
 * Shell command action.
 *
 * Renders `{{placeholder}}` fields of the command template from the node's
 * inputs and the event context, then runs it through the shell in its own
 * process group so a timeout can kill the whole tree.
 */

import { type ChildProcess, spawn } from "node:child_process";

import type { ShellCommandConfig } from "../core/node-kinds.js";
import type { PortValue } from "../types.js";
import type { ActionEffector, ActionOutcome, ActionRequest } from "./types.js";

/** Captured output beyond this many characters per stream is cut. */
export const OUTPUT_LIMIT = 64 * 1024;

/** Quote a value for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Replace `{{name}}` placeholders with shell-quoted values.
 * Unknown placeholders are left in place.
 */
export function renderCommand(template: string, values: Readonly<Record<string, PortValue | undefined>>): string {
  return template.replace(/\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (match, name: string) => {
    const value = values[name];
    if (value === undefined) return match;
    return shellQuote(value === null ? "" : String(value));
  });
}

/** Template fields available to a command: inputs first, then event context. */
export function templateValues({
  inputs,
  eventContext,
}: Pick<ActionRequest<unknown>, "inputs" | "eventContext">): Record<string, PortValue> {
  return {
    ...inputs,
    device: eventContext.device,
    channel: eventContext.channel,
    controlId: eventContext.controlId,
    rawValue: eventContext.rawValue,
    timestamp: eventContext.timestamp,
    nodeId: eventContext.nodeId,
  };
}

/** Keeps the first `limit` bytes of a stream and decodes them once. */
class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept !== chunk) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks, this.size).toString("utf-8");
    return this.truncated ? `${text}\n[truncated]` : text;
  }
}

export interface ShellCommandOptions {
  /** Base environment; defaults to the server's own */
  env?: NodeJS.ProcessEnv;
  outputLimit?: number;
}

export class ShellCommandAction implements ActionEffector<ShellCommandConfig> {
  constructor(private readonly options: ShellCommandOptions = {}) {}

  execute(request: ActionRequest<ShellCommandConfig>): Promise<ActionOutcome> {
    const { config, inputs, eventContext, signal } = request;
    const command = renderCommand(config.command, templateValues(request));
    const env: NodeJS.ProcessEnv = {
      ...(this.options.env ?? process.env),
      ...config.env,
      MIDI_VALUE: inputs.value === undefined || inputs.value === null ? "" : String(inputs.value),
      MIDI_DEVICE: eventContext.device,
      MIDI_CHANNEL: String(eventContext.channel),
      MIDI_CONTROL: String(eventContext.controlId),
      MIDI_NODE_ID: String(eventContext.nodeId),
    };
    const limit = this.options.outputLimit ?? OUTPUT_LIMIT;

    return new Promise((resolve) => {
      const stdout = new CappedBuffer(limit);
      const stderr = new CappedBuffer(limit);
      let settled = false;
      let child: ChildProcess;

      const finish = (outcome: ActionOutcome) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        resolve({ ...outcome, stdout: stdout.toString(), stderr: stderr.toString() });
      };

      const onAbort = () => {
        killGroup(child);
        finish({ ok: false, reason: "timeout", message: `command killed after ${request.timeoutMs}ms: ${command}` });
      };

      try {
        child = spawn(command, {
          shell: true,
          detached: true,
          cwd: config.cwd,
          env,
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (error) {
        resolve({
          ok: false,
          reason: "spawn",
          message: error instanceof Error ? error.message : String(error),
        });
        return;
      }

      child.stdout?.on("data", (chunk: Buffer) => stdout.append(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.append(chunk));
      child.on("error", (error) => finish({ ok: false, reason: "spawn", message: error.message }));
      child.on("close", (code, sig) => {
        if (code === 0) {
          finish({ ok: true, detail: `ran: ${command}` });
        } else if (code !== null) {
          finish({ ok: false, reason: "exit", message: `command exited with code ${code}: ${command}` });
        } else {
          finish({ ok: false, reason: "exit", message: `command terminated by ${sig ?? "signal"}: ${command}` });
        }
      });

      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/** Kill the child's whole process group, falling back to the child alone. */
function killGroup(child: ChildProcess): void {
  if (child.pid === undefined || child.exitCode !== null) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch {
    child.kill("SIGKILL");
  }
}
