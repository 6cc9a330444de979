/**
 * Built-in workspace presets, shipped as JSON files under presets/.
 */

import { readdir, readFile } from "node:fs/promises";
import { z } from "zod";

import { GraphError } from "../core/errors.js";
import { fromSnapshot, type WorkspaceSnapshot } from "./workspace.js";

export const PRESETS_DIR = new URL("../../presets/", import.meta.url);

const PresetFile = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(""),
  workspace: z.unknown(),
});

export interface PresetInfo {
  id: string;
  name: string;
  description: string;
}

export interface Preset extends PresetInfo {
  workspace: WorkspaceSnapshot;
}

async function readPreset(file: URL): Promise<Preset> {
  const parsed = PresetFile.safeParse(JSON.parse(await readFile(file, "utf-8")));
  if (!parsed.success) {
    throw new GraphError("InvalidSnapshot", `Malformed preset ${file.pathname}: ${parsed.error.message}`);
  }
  const { workspace, ...info } = parsed.data;
  return { ...info, workspace: fromSnapshot(workspace) };
}

export async function listPresets(dir: URL = PRESETS_DIR): Promise<PresetInfo[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  const presets = await Promise.all(files.map((f) => readPreset(new URL(f, dir))));
  return presets.map(({ id, name, description }) => ({ id, name, description }));
}

/** @throws Error when no preset has this id */
export async function loadPreset(id: string, dir: URL = PRESETS_DIR): Promise<Preset> {
  if (!/^[a-z0-9][a-z0-9-]*$/.test(id)) throw new Error(`Unknown preset "${id}"`);
  try {
    return await readPreset(new URL(`${id}.json`, dir));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      const available = (await listPresets(dir)).map((p) => p.id);
      throw new Error(`Unknown preset "${id}". Available presets: ${available.join(", ")}`);
    }
    throw error;
  }
}
