/**
 * System audio backends: PipeWire (wpctl) or PulseAudio (pactl).
 */

import { execFile } from "node:child_process";
import { access, constants } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_SINK = "@DEFAULT_AUDIO_SINK@";

/** Raised by a backend when the named sink does not exist. */
export class SinkNotFoundError extends Error {
  constructor(readonly sink: string, detail?: string) {
    super(`Audio sink "${sink}" not found${detail ? `: ${detail}` : ""}`);
    this.name = "SinkNotFoundError";
  }
}

/** An output a Volume node can target through its `sink` setting. */
export interface AudioSink {
  id: string;
  name: string;
  kind: "default" | "sink";
}

export interface AudioBackend {
  readonly name: string;
  /** Set a sink's level in [0, 1]. */
  setLevel(sink: string, level: number, signal?: AbortSignal): Promise<void>;
  /** The default-output alias first, then every sink the server reports. */
  listSinks(signal?: AbortSignal): Promise<AudioSink[]>;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type ExecFn = (file: string, args: string[], signal?: AbortSignal) => Promise<ExecResult>;

const run: ExecFn = (file, args, signal) => {
  return new Promise((resolve, reject) => {
    execFile(file, args, { signal, timeout: 10_000 }, (error, stdout, stderr) => {
      if (error) {
        reject(Object.assign(error, { stderr: String(stderr) }));
        return;
      }
      resolve({ stdout: String(stdout), stderr: String(stderr) });
    });
  });
};

const DEFAULT_OUTPUT: AudioSink = { id: DEFAULT_SINK, name: "System Default Output", kind: "default" };

const SECTION = /^[\s│├└─]*([A-Za-z][A-Za-z ]*):\s*$/;
const WPCTL_ENTRY = /^\s*│[\s*]*(\d+)\.\s+([^[]+)/;

/** Sinks listed under "Audio" → "Sinks:" in `wpctl status` output. */
export function parseWpctlSinks(output: string): AudioSink[] {
  const sinks: AudioSink[] = [];
  let audio = false;
  let inSinks = false;
  for (const line of output.split("\n")) {
    if (/^\S/.test(line)) {
      audio = line.trim() === "Audio";
      inSinks = false;
      continue;
    }
    const section = SECTION.exec(line);
    if (section) {
      inSinks = audio && section[1] === "Sinks";
      continue;
    }
    const entry = inSinks ? WPCTL_ENTRY.exec(line) : null;
    if (entry) sinks.push({ id: entry[1], name: entry[2].trim(), kind: "sink" });
  }
  return sinks;
}

/** Sinks from `pactl list short sinks`: tab-separated index and name. */
export function parsePactlSinks(output: string): AudioSink[] {
  const sinks: AudioSink[] = [];
  for (const line of output.split("\n")) {
    const [id, name] = line.split("\t");
    if (id && name) sinks.push({ id: id.trim(), name: name.trim(), kind: "sink" });
  }
  return sinks;
}

const NOT_FOUND = /no such|not found|doesn't exist|does not exist|invalid (id|sink)|failure: no such entity/i;

/** Runs a volume command and maps "no such sink" failures to SinkNotFoundError. */
export class CommandAudioBackend implements AudioBackend {
  constructor(
    readonly name: "wpctl" | "pactl",
    private readonly exec: ExecFn = run,
  ) {}

  async setLevel(sink: string, level: number, signal?: AbortSignal): Promise<void> {
    const { file, args } = this.command(sink, level);
    try {
      await this.exec(file, args, signal);
    } catch (error) {
      const stderr = error instanceof Error && "stderr" in error ? String(error.stderr) : "";
      const message = error instanceof Error ? error.message : String(error);
      if (NOT_FOUND.test(stderr) || NOT_FOUND.test(message)) {
        throw new SinkNotFoundError(sink, stderr.trim() || undefined);
      }
      throw error;
    }
  }

  async listSinks(signal?: AbortSignal): Promise<AudioSink[]> {
    const listed =
      this.name === "wpctl"
        ? parseWpctlSinks((await this.exec("wpctl", ["status"], signal)).stdout)
        : parsePactlSinks((await this.exec("pactl", ["list", "short", "sinks"], signal)).stdout);
    const seen = new Set<string>();
    return [DEFAULT_OUTPUT, ...listed].filter((sink) => {
      if (seen.has(sink.id)) return false;
      seen.add(sink.id);
      return true;
    });
  }

  /** The command line for a level change. */
  command(sink: string, level: number): { file: string; args: string[] } {
    if (this.name === "wpctl") {
      return { file: "wpctl", args: ["set-volume", sink, level.toFixed(3)] };
    }
    const target = sink === DEFAULT_SINK ? "@DEFAULT_SINK@" : sink;
    return { file: "pactl", args: ["set-sink-volume", target, `${Math.round(level * 100)}%`] };
  }
}

async function onPath(binary: string, searchPath: string): Promise<boolean> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    try {
      await access(path.join(dir, binary), constants.X_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

/** Pick wpctl when installed, otherwise pactl, otherwise null. */
export async function detectAudioBackend(searchPath = process.env.PATH ?? ""): Promise<AudioBackend | null> {
  if (await onPath("wpctl", searchPath)) return new CommandAudioBackend("wpctl");
  if (await onPath("pactl", searchPath)) return new CommandAudioBackend("pactl");
  return null;
}
