/**
 * Profiles: named, graph-independent binding sets.
 *
 * A profile entry names a port rather than a node, so the same controller
 * layout can be applied to any MidiInput node that declares those ports.
 */

import type { ControlTriple, NodeId } from "../types.js";
import type { BindingTable, BindResult } from "./bindings.js";
import { GraphError } from "./errors.js";
import type { Graph } from "./graph.js";

export interface ProfileEntry extends ControlTriple {
  port: string;
}

export interface Profile {
  id: string;
  name: string;
  entries: ProfileEntry[];
}

export interface ApplyResult {
  applied: BindResult[];
  /** Entries whose port the target node does not declare */
  skipped: ProfileEntry[];
}

export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "profile";
}

export class ProfileStore {
  private readonly profiles = new Map<string, Profile>();

  /** Store a profile under a fresh id derived from its name. */
  add(name: string, entries: ProfileEntry[]): Profile {
    const base = slugify(name);
    let id = base;
    for (let n = 2; this.profiles.has(id); n++) id = `${base}-${n}`;
    const profile: Profile = { id, name, entries: entries.map((e) => ({ ...e })) };
    this.profiles.set(id, profile);
    return profile;
  }

  /** Store a profile under its own id, replacing any existing one. */
  put(profile: Profile): void {
    this.profiles.set(profile.id, { ...profile, entries: profile.entries.map((e) => ({ ...e })) });
  }

  /**
   * Capture the bindings that currently target `node` as a new profile.
   * @throws GraphError UnknownNode
   */
  capture(name: string, graph: Graph, bindings: BindingTable, node: NodeId): Profile {
    graph.requireNode(node);
    const entries = bindings.forNode(node).map((b) => ({
      device: b.device,
      channel: b.channel,
      controlId: b.controlId,
      port: b.target.port,
    }));
    return this.add(name, entries);
  }

  get(id: string): Profile | undefined {
    return this.profiles.get(id);
  }

  remove(id: string): boolean {
    return this.profiles.delete(id);
  }

  list(): Profile[] {
    return [...this.profiles.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  get size(): number {
    return this.profiles.size;
  }

  clear(): void {
    this.profiles.clear();
  }

  /**
   * Bind every entry of a profile to the matching input port of `node`.
   * @throws Error for an unknown profile, GraphError UnknownNode for a missing node
   */
  apply(id: string, graph: Graph, bindings: BindingTable, node: NodeId): ApplyResult {
    const profile = this.profiles.get(id);
    if (!profile) throw new Error(`Unknown profile "${id}"`);
    const inputs = new Set(
      graph
        .ports(node)
        .filter((p) => p.direction === "input")
        .map((p) => p.name),
    );

    const result: ApplyResult = { applied: [], skipped: [] };
    for (const entry of profile.entries) {
      if (!inputs.has(entry.port)) {
        result.skipped.push(entry);
        continue;
      }
      result.applied.push(bindings.bind(entry, { node, port: entry.port }));
    }
    if (result.applied.length === 0 && profile.entries.length > 0) {
      throw new GraphError(
        "UnknownPort",
        `Node ${node} declares none of the ports in profile "${id}"`,
      );
    }
    return result;
  }
}
