/**
 * Zod schemas for binding, learn mode and event delivery tools.
 */

import { z } from "zod";

const triple = {
  device: z.string().min(1).describe('Device id as the event source reports it, e.g. "xone-k2".'),
  channel: z.number().int().min(0).max(16).describe("MIDI channel."),
  controlId: z.number().int().min(0).max(127).describe("CC or note number."),
};

const target = {
  node: z.number().int().positive().describe("Target node id."),
  port: z.string().min(1).describe("Target input port name."),
};

export const bindSchema = { ...triple, ...target };

export const unbindSchema = triple;

export const listBindingsSchema = {
  node: z.number().int().positive().optional().describe("Only bindings that target this node."),
};

export const startLearningSchema = {
  ...target,
  sourceId: z
    .string()
    .optional()
    .describe("Only accept events from this source (e.g. an OSC listener id)."),
};

export const deliverEventSchema = {
  ...triple,
  rawValue: z.number().describe("Raw control value, 0-127 for a MIDI CC."),
  kind: z
    .enum(["continuous", "trigger"])
    .default("continuous")
    .describe('"continuous" for faders and pots, "trigger" for buttons and pads.'),
  timestamp: z.number().optional().describe("Event time in ms. Defaults to now."),
  wait: z
    .boolean()
    .default(true)
    .describe("Wait for triggered actions to finish and include their outcomes."),
};

export type BindInput = z.infer<z.ZodObject<typeof bindSchema>>;
export type DeliverEventInput = z.infer<z.ZodObject<typeof deliverEventSchema>>;
