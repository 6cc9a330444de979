/**
 * Profile, workspace file and preset tools.
 */

import type { Session } from "../runtime/session.js";
import { listPresets, loadPreset } from "../storage/presets.js";
import { loadWorkspace, restoreSnapshot } from "../storage/workspace.js";
import { formatBinding, formatProfile } from "./format.js";

export function executeSaveProfile(session: Session, name: string, node: number): string {
  const profile = session.profiles.capture(name, session.graph, session.bindings, node);
  return `Saved profile ${formatProfile(profile)}`;
}

export function executeApplyProfile(session: Session, id: string, node: number): string {
  const { applied, skipped } = session.profiles.apply(id, session.graph, session.bindings, node);
  const lines = [`Applied profile "${id}" to node #${node}: ${applied.length} bound, ${skipped.length} skipped`];
  for (const { binding } of applied) lines.push(`  ${formatBinding(binding)}`);
  for (const entry of skipped) lines.push(`  skipped: no port "${entry.port}"`);
  return lines.join("\n");
}

export function executeListProfiles(session: Session): string {
  const profiles = session.profiles.list();
  if (profiles.length === 0) return "No profiles.";
  return [`Profiles (${profiles.length}):`, ...profiles.map((p) => `  ${formatProfile(p)}`)].join("\n");
}

export function executeDeleteProfile(session: Session, id: string): string {
  return session.profiles.remove(id) ? `Deleted profile "${id}"` : `No profile "${id}"`;
}

function requirePath(session: Session, path: string | undefined): string {
  const resolved = path ?? session.config.workspacePath;
  if (!resolved) throw new Error("No path given and MIDI_GRAPH_WORKSPACE is not set");
  return resolved;
}

export async function executeSaveWorkspace(session: Session, path?: string): Promise<string> {
  const target = requirePath(session, path);
  const snapshot = await session.checkpoint(target);
  const nodes = snapshot?.nodes.length ?? 0;
  const bindings = snapshot?.bindings.length ?? 0;
  return `Saved workspace to ${target} (${nodes} nodes, ${bindings} bindings)`;
}

export async function executeLoadWorkspace(session: Session, path?: string): Promise<string> {
  const source = requirePath(session, path);
  restoreSnapshot(await loadWorkspace(source), session);
  return `Loaded workspace from ${source} (${session.graph.size} nodes, ${session.bindings.size} bindings)`;
}

export async function executeListPresets(): Promise<string> {
  const presets = await listPresets();
  if (presets.length === 0) return "No presets.";
  return [
    `Presets (${presets.length}):`,
    ...presets.map((p) => `  ${p.id}: ${p.name}${p.description ? `: ${p.description}` : ""}`),
  ].join("\n");
}

export async function executeLoadPreset(session: Session, id: string): Promise<string> {
  const preset = await loadPreset(id);
  restoreSnapshot(preset.workspace, session);
  return `Loaded preset "${preset.name}" (${session.graph.size} nodes, ${session.bindings.size} bindings)`;
}
