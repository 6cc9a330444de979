/**
 * Runtime configuration from environment variables.
 */

import path from "node:path";
import { z } from "zod";

import { LOG_LEVELS } from "./logger.js";

const optionalString = z
  .string()
  .trim()
  .transform((s) => (s.length > 0 ? s : undefined))
  .optional();

export const RuntimeConfigSchema = z.object({
  workspacePath: optionalString,
  workerPoolSize: z.coerce.number().int().min(1).max(64).default(4),
  actionTimeoutMs: z.coerce.number().int().min(10).max(600_000).default(5000),
  terminationGraceMs: z.coerce.number().int().min(0).max(60_000).default(250),
  checkpointIntervalMs: z.coerce.number().int().min(0).default(0),
  oscPort: z.coerce.number().int().min(1).max(65535).optional(),
  oscHost: z.string().min(1).default("127.0.0.1"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  scriptAllowedPaths: z.array(z.string().min(1)).default([]),
});

export type RuntimeConfig = Readonly<z.infer<typeof RuntimeConfigSchema>>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const ENV_KEYS = {
  workspacePath: "MIDI_GRAPH_WORKSPACE",
  workerPoolSize: "MIDI_GRAPH_POOL_SIZE",
  actionTimeoutMs: "MIDI_GRAPH_ACTION_TIMEOUT_MS",
  terminationGraceMs: "MIDI_GRAPH_GRACE_MS",
  checkpointIntervalMs: "MIDI_GRAPH_CHECKPOINT_MS",
  oscPort: "MIDI_GRAPH_OSC_PORT",
  oscHost: "MIDI_GRAPH_OSC_HOST",
  logLevel: "MIDI_GRAPH_LOG_LEVEL",
  scriptAllowedPaths: "MIDI_GRAPH_SCRIPT_PATHS",
} as const satisfies Record<keyof z.input<typeof RuntimeConfigSchema>, string>;

/**
 * Build the runtime config from environment variables, then apply overrides.
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<z.input<typeof RuntimeConfigSchema>> = {},
): RuntimeConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value === undefined || value === "") continue;
    raw[field] =
      field === "scriptAllowedPaths" ? value.split(path.delimiter).filter((p) => p.length > 0) : value;
  }

  const result = RuntimeConfigSchema.safeParse({ ...raw, ...overrides });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = issue.path.join(".");
        const key = Object.entries(ENV_KEYS).find(([name]) => name === field)?.[1];
        return `${field}${key ? ` (${key})` : ""}: ${issue.message}`;
      }),
    );
  }
  return Object.freeze(result.data);
}
