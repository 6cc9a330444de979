/**
 * Workspace snapshot: versioned JSON document for the graph, bindings and profiles.
 *
 *   {
 *     "version": 1,
 *     "nodes":    [{ id, kind, title, config, position? }],
 *     "edges":    [{ id, from: { node, port }, to: { node, port } }],
 *     "bindings": [{ device, channel, controlId, node, port }],
 *     "profiles": [{ id, name, entries: [{ device, channel, controlId, port }] }]
 *   }
 *
 * Ids are preserved. Loading validates the whole document against a scratch
 * graph before the live one is touched.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { BindingTable } from "../core/bindings.js";
import { GraphError } from "../core/errors.js";
import { Graph } from "../core/graph.js";
import { NODE_KINDS } from "../core/node-kinds.js";
import type { ProfileStore } from "../core/profiles.js";

export const SNAPSHOT_VERSION = 1;

const id = z.number().int().positive();
const portRef = z.object({ node: id, port: z.string().min(1) });
const triple = {
  device: z.string().min(1),
  channel: z.number().int().min(0),
  controlId: z.number().int().min(0),
};

export const WorkspaceSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  nodes: z.array(
    z.object({
      id,
      kind: z.enum(NODE_KINDS),
      title: z.string(),
      config: z.unknown(),
      position: z.tuple([z.number(), z.number()]).optional(),
    }),
  ),
  edges: z.array(z.object({ id, from: portRef, to: portRef })),
  bindings: z.array(z.object({ ...triple, node: id, port: z.string().min(1) })),
  profiles: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string(),
        entries: z.array(z.object({ ...triple, port: z.string().min(1) })),
      }),
    )
    .default([]),
});

export type WorkspaceSnapshot = z.infer<typeof WorkspaceSnapshotSchema>;

export interface Workspace {
  graph: Graph;
  bindings: BindingTable;
  profiles: ProfileStore;
}

export function toSnapshot({ graph, bindings, profiles }: Workspace): WorkspaceSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    nodes: graph.nodes().map((node) => ({
      id: node.id,
      kind: node.kind,
      title: node.title,
      config: structuredClone(node.config),
      ...(node.position ? { position: node.position } : {}),
    })),
    edges: graph.edges().map((edge) => ({
      id: edge.id,
      from: { ...edge.from },
      to: { ...edge.to },
    })),
    bindings: bindings.list().map((b) => ({
      device: b.device,
      channel: b.channel,
      controlId: b.controlId,
      node: b.target.node,
      port: b.target.port,
    })),
    profiles: profiles.list().map((p) => ({
      id: p.id,
      name: p.name,
      entries: p.entries.map((e) => ({ ...e })),
    })),
  };
}

/**
 * Validate an untyped document.
 * @throws GraphError InvalidSnapshot
 */
export function fromSnapshot(doc: unknown): WorkspaceSnapshot {
  const result = WorkspaceSnapshotSchema.safeParse(doc);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new GraphError("InvalidSnapshot", `Invalid workspace snapshot: ${issues.join("; ")}`);
  }
  return result.data;
}

function build(snapshot: WorkspaceSnapshot, graph: Graph, bindings: BindingTable): void {
  for (const node of snapshot.nodes) {
    graph.restoreNode(node.id, node.kind, node.config, { title: node.title, position: node.position });
  }
  for (const edge of [...snapshot.edges].sort((a, b) => a.id - b.id)) {
    graph.restoreEdge(edge.id, edge.from, edge.to);
  }
  for (const b of snapshot.bindings) {
    bindings.bind(b, { node: b.node, port: b.port });
  }
}

/**
 * Replace the workspace's contents with a snapshot.
 * Nothing changes when the snapshot does not describe a valid graph.
 * @throws GraphError InvalidSnapshot (wrapping the first structural error)
 */
export function restoreSnapshot(snapshot: WorkspaceSnapshot, workspace: Workspace): void {
  const scratch = new Graph();
  try {
    build(snapshot, scratch, new BindingTable(scratch));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new GraphError("InvalidSnapshot", `Snapshot does not describe a valid workspace: ${msg}`);
  }

  workspace.graph.clear();
  workspace.bindings.clear();
  workspace.profiles.clear();
  build(snapshot, workspace.graph, workspace.bindings);
  for (const profile of snapshot.profiles) workspace.profiles.put(profile);
}

/** Write a snapshot to a temp file beside `path`, then rename it into place. */
export async function saveWorkspace(path: string, workspace: Workspace): Promise<WorkspaceSnapshot> {
  const snapshot = toSnapshot(workspace);
  await mkdir(dirname(path), { recursive: true });
  const temp = `${path}.${process.pid}.tmp`;
  await writeFile(temp, JSON.stringify(snapshot, null, 2) + "\n", "utf-8");
  await rename(temp, path);
  return snapshot;
}

/**
 * Read and validate a snapshot file.
 * @throws GraphError InvalidSnapshot for malformed JSON or schema violations
 */
export async function loadWorkspace(path: string): Promise<WorkspaceSnapshot> {
  const text = await readFile(path, "utf-8");
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new GraphError("InvalidSnapshot", `${path} is not valid JSON: ${msg}`);
  }
  return fromSnapshot(doc);
}
