/**
 * The closed set of node kinds.
 *
 * Each kind carries a zod schema for its configuration, the ports that
 * configuration declares, and a pure evaluation function. Action kinds
 * (Volume, ShellCommand, Script) have no outputs; their side effect runs
 * in the action sandbox, not here.
 */

import vm from "node:vm";
import { z } from "zod";

import type { PortSpec, PortValue } from "../types.js";
import { GraphError } from "./errors.js";
import { mapValue } from "./value-map.js";

export const NODE_KINDS = ["MidiInput", "ValueMap", "Volume", "ShellCommand", "Script"] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

export const ACTION_KINDS = ["Volume", "ShellCommand", "Script"] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export function wrapScriptSource(source: string): string {
  return `(async () => {\n${source}\n})()`;
}

// ---------------------------------------------------------------------------
// Config schemas
// ---------------------------------------------------------------------------

const portName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, "port names must start with a letter or underscore");

const timeoutMs = z.number().int().positive().max(600_000).optional();

const midiInputConfig = z.object({
  ports: z
    .array(z.object({ name: portName, type: z.enum(["number", "trigger", "string"]) }))
    .min(1, "MidiInput needs at least one port")
    .superRefine((ports, ctx) => {
      const seen = new Set<string>();
      for (const port of ports) {
        if (seen.has(port.name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate port "${port.name}"` });
        }
        seen.add(port.name);
      }
    }),
});

const valueMapConfig = z
  .object({
    inMin: z.number().finite().default(0),
    inMax: z.number().finite().default(127),
    outMin: z.number().finite().default(0),
    outMax: z.number().finite().default(1),
    curve: z.enum(["linear", "log", "exp", "step", "piecewise"]).default("linear"),
    steps: z.number().int().min(1).max(1024).default(8),
    points: z.array(z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)])).optional(),
    round: z.boolean().default(false),
    precision: z.number().int().min(0).max(6).default(2),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.inMin === cfg.inMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "inMin and inMax must differ" });
    }
    if (cfg.curve !== "piecewise") return;
    const points = cfg.points ?? [];
    if (points.length < 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "piecewise curve needs at least 2 points" });
      return;
    }
    for (let i = 1; i < points.length; i++) {
      if (points[i][0] <= points[i - 1][0]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "piecewise points must have strictly increasing x",
        });
        return;
      }
    }
  });

const volumeConfig = z.object({
  sink: z.string().min(1).default("@DEFAULT_AUDIO_SINK@"),
  timeoutMs,
});

const shellCommandConfig = z.object({
  command: z.string().trim().min(1, "command must not be empty"),
  cwd: z.string().min(1).optional(),
  timeoutMs,
  env: z.record(z.string()).optional(),
});

const scriptConfig = z
  .object({
    source: z.string().refine((s) => s.trim().length > 0, "script source must not be empty"),
    timeoutMs,
    allowedPaths: z.array(z.string().min(1)).optional(),
  })
  .superRefine((cfg, ctx) => {
    try {
      new vm.Script(wrapScriptSource(cfg.source), { filename: "script-node.js" });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `script does not compile: ${msg}` });
    }
  });

export type MidiInputConfig = z.infer<typeof midiInputConfig>;
export type ValueMapConfig = z.infer<typeof valueMapConfig>;
export type VolumeConfig = z.infer<typeof volumeConfig>;
export type ShellCommandConfig = z.infer<typeof shellCommandConfig>;
export type ScriptConfig = z.infer<typeof scriptConfig>;

export interface NodeConfigMap {
  MidiInput: MidiInputConfig;
  ValueMap: ValueMapConfig;
  Volume: VolumeConfig;
  ShellCommand: ShellCommandConfig;
  Script: ScriptConfig;
}

/** A kind paired with its validated configuration. */
export type NodeVariant = { [K in NodeKind]: { kind: K; config: NodeConfigMap[K] } }[NodeKind];

export type ActionVariant = Extract<NodeVariant, { kind: ActionKind }>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseWith<T>(kind: NodeKind, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new GraphError("InvalidConfig", `Invalid ${kind} config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate raw configuration for a kind.
 * @throws GraphError InvalidConfig
 */
export function parseNodeConfig(kind: NodeKind, raw: unknown): NodeVariant {
  switch (kind) {
    case "MidiInput":
      return { kind, config: parseWith(kind, midiInputConfig, raw) };
    case "ValueMap":
      return { kind, config: parseWith(kind, valueMapConfig, raw) };
    case "Volume":
      return { kind, config: parseWith(kind, volumeConfig, raw) };
    case "ShellCommand":
      return { kind, config: parseWith(kind, shellCommandConfig, raw) };
    case "Script":
      return { kind, config: parseWith(kind, scriptConfig, raw) };
    default:
      throw new GraphError("InvalidConfig", `Unknown node kind "${String(kind)}"`);
  }
}

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

const ACTION_INPUTS: PortSpec[] = [
  { name: "trigger", direction: "input", type: "trigger" },
  { name: "value", direction: "input", type: "number" },
  { name: "text", direction: "input", type: "string" },
];

/** Ports declared by a node's kind and configuration, inputs first. */
export function portsOf(node: NodeVariant): PortSpec[] {
  switch (node.kind) {
    case "MidiInput":
      return [
        ...node.config.ports.map((p): PortSpec => ({ name: p.name, direction: "input", type: p.type })),
        ...node.config.ports.map((p): PortSpec => ({ name: p.name, direction: "output", type: p.type })),
      ];
    case "ValueMap":
      return [
        { name: "in", direction: "input", type: "number" },
        { name: "out", direction: "output", type: "number" },
        { name: "text", direction: "output", type: "string" },
      ];
    case "Volume":
      return [{ name: "level", direction: "input", type: "number" }];
    case "ShellCommand":
    case "Script":
      return ACTION_INPUTS;
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Compute the outputs a node emits for this pass.
 *
 * @param touched - input ports written during the current pass
 * @returns only the outputs the node emits; absent ports are not propagated
 */
export function evaluateNode(
  node: NodeVariant,
  inputs: ReadonlyMap<string, PortValue>,
  touched: ReadonlySet<string>,
): Map<string, PortValue> {
  const outputs = new Map<string, PortValue>();
  switch (node.kind) {
    case "MidiInput":
      for (const name of touched) {
        outputs.set(name, inputs.get(name) ?? null);
      }
      return outputs;
    case "ValueMap": {
      const raw = inputs.get("in");
      if (typeof raw !== "number" || !Number.isFinite(raw)) return outputs;
      const mapped = mapValue(raw, node.config);
      outputs.set("out", mapped);
      outputs.set("text", mapped.toFixed(node.config.precision));
      return outputs;
    }
    case "Volume":
    case "ShellCommand":
    case "Script":
      return outputs;
  }
}

/** The node's kind and config when it is an action node, otherwise null. */
export function actionVariantOf(node: NodeVariant): ActionVariant | null {
  switch (node.kind) {
    case "Volume":
      return { kind: node.kind, config: node.config };
    case "ShellCommand":
      return { kind: node.kind, config: node.config };
    case "Script":
      return { kind: node.kind, config: node.config };
    default:
      return null;
  }
}
