/**
 * Zod schemas for profiles, workspace files, presets, devices and diagnostics.
 */

import { z } from "zod";

const nodeId = z.number().int().positive();

export const saveProfileSchema = {
  name: z.string().min(1).describe("Profile name."),
  node: nodeId.describe("Capture the bindings that currently target this node."),
};

export const applyProfileSchema = {
  profile: z.string().min(1).describe("Profile id, as shown by list_profiles."),
  node: nodeId.describe("MidiInput node whose ports the profile entries bind to."),
};

export const deleteProfileSchema = {
  profile: z.string().min(1).describe("Profile id."),
};

export const workspacePathSchema = {
  path: z
    .string()
    .min(1)
    .optional()
    .describe("Workspace JSON file. Defaults to the configured workspace path."),
};

export const loadPresetSchema = {
  preset: z.string().min(1).describe('Preset id, e.g. "default-mixer".'),
};

export const createDeviceProfileSchema = {
  device: z.string().min(1).describe('Device layout name, e.g. "xone-k2" or "k2".'),
  deviceId: z.string().min(1).describe("Device id the event source reports for this controller."),
  channel: z.number().int().min(0).max(16).optional().describe("MIDI channel. Defaults to the layout's."),
  createNode: z
    .boolean()
    .default(false)
    .describe("Also add a MidiInput node with a port per control and apply the profile to it."),
};

export const getDiagnosticsSchema = {
  limit: z.number().int().min(1).max(100).default(20).describe("Most recent reports to show."),
  failuresOnly: z.boolean().default(false),
};

export type CreateDeviceProfileInput = z.infer<z.ZodObject<typeof createDeviceProfileSchema>>;
