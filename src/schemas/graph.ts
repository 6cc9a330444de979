/**
 * Zod schemas for the graph editing tools.
 */

import { z } from "zod";

import { NODE_KINDS } from "../core/node-kinds.js";

const nodeId = z.number().int().positive();
const edgeId = z.number().int().positive();
const position = z
  .tuple([z.number(), z.number()])
  .optional()
  .describe("Editor layout position [x, y]. Stored as-is.");

export const addNodeSchema = {
  kind: z
    .enum(NODE_KINDS)
    .describe(
      "Node kind. MidiInput declares ports controls bind to; ValueMap rescales a number; " +
        "Volume, ShellCommand and Script are actions that run when they are reached.",
    ),
  config: z
    .record(z.unknown())
    .default({})
    .describe(
      "Kind-specific configuration. MidiInput: { ports: [{ name, type: number|trigger|string }] }. " +
        "ValueMap: { inMin, inMax, outMin, outMax, curve: linear|log|exp|step|piecewise, steps, points, round, precision }. " +
        "Volume: { sink }. ShellCommand: { command, cwd, timeoutMs, env }; {{value}} style placeholders are filled in. " +
        "Script: { source, timeoutMs, allowedPaths }.",
    ),
  title: z.string().optional().describe("Display title. Defaults to the kind."),
  position,
};

export const updateNodeSchema = {
  node: nodeId.describe("Node id."),
  config: z
    .record(z.unknown())
    .optional()
    .describe("Replacement configuration. Omit to change only the title or position."),
  title: z.string().optional(),
  position,
};

export const removeNodeSchema = {
  node: nodeId.describe("Node id. Its edges and bindings are removed with it."),
};

export const connectSchema = {
  fromNode: nodeId.describe("Source node id."),
  fromPort: z.string().min(1).describe("Output port on the source node."),
  toNode: nodeId.describe("Destination node id."),
  toPort: z.string().min(1).describe("Input port on the destination node."),
};

export const disconnectSchema = {
  edge: edgeId.describe("Edge id, as shown by describe_graph."),
};

export const describeGraphSchema = {
  node: nodeId.optional().describe("Describe a single node in detail instead of the whole graph."),
};

export type AddNodeInput = z.infer<z.ZodObject<typeof addNodeSchema>>;
export type UpdateNodeInput = z.infer<z.ZodObject<typeof updateNodeSchema>>;
export type ConnectInput = z.infer<z.ZodObject<typeof connectSchema>>;
