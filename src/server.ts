/**
 * MCP tool registrations. Every handler renders plain text; failures come
 * back as `isError` results rather than protocol errors.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { Session } from "./runtime/session.js";
import {
  bindSchema,
  deliverEventSchema,
  listBindingsSchema,
  startLearningSchema,
  unbindSchema,
} from "./schemas/bindings.js";
import {
  addNodeSchema,
  connectSchema,
  describeGraphSchema,
  disconnectSchema,
  removeNodeSchema,
  updateNodeSchema,
} from "./schemas/graph.js";
import {
  applyProfileSchema,
  createDeviceProfileSchema,
  deleteProfileSchema,
  getDiagnosticsSchema,
  loadPresetSchema,
  saveProfileSchema,
  workspacePathSchema,
} from "./schemas/workspace.js";
import {
  executeBind,
  executeCancelLearning,
  executeListBindings,
  executeStartLearning,
  executeUnbind,
  formatLearnState,
} from "./tools/bindings.js";
import { executeListAudioSinks } from "./tools/audio.js";
import { executeCreateDeviceProfile, executeListDevices } from "./tools/devices.js";
import { executeGetDiagnostics } from "./tools/diagnostics.js";
import { executeDeliverEvent } from "./tools/events.js";
import {
  executeAddNode,
  executeConnect,
  executeDescribeGraph,
  executeDisconnect,
  executeRemoveNode,
  executeUpdateNode,
} from "./tools/graph.js";
import {
  executeApplyProfile,
  executeDeleteProfile,
  executeListPresets,
  executeListProfiles,
  executeLoadPreset,
  executeLoadWorkspace,
  executeSaveProfile,
  executeSaveWorkspace,
} from "./tools/workspace.js";

export const SERVER_NAME = "midi-graph-mcp-server";
export const SERVER_VERSION = "0.1.0";

export async function respond(action: string, run: () => string | Promise<string>) {
  try {
    const text = await run();
    return { content: [{ type: "text" as const, text }] };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    return {
      content: [{ type: "text" as const, text: `Error ${action}: ${msg}` }],
      isError: true,
    };
  }
}

export function createServer(session: Session): McpServer {
  const { graph, bindings, learner } = session;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // -------------------------------------------------------------------------
  // Graph
  // -------------------------------------------------------------------------

  server.tool(
    "add_node",
    "Add a node to the control graph. Returns the node id and its ports.",
    addNodeSchema,
    async (input) => respond("adding node", () => executeAddNode(graph, input)),
  );

  server.tool(
    "update_node",
    "Replace a node's configuration, title or position. Bindings to ports the new config drops are removed; " +
      "dropping a port that still has an edge is rejected.",
    updateNodeSchema,
    async (input) => respond("updating node", () => executeUpdateNode(graph, input)),
  );

  server.tool(
    "remove_node",
    "Remove a node together with its edges and bindings.",
    removeNodeSchema,
    async ({ node }) => respond("removing node", () => executeRemoveNode(graph, bindings, node)),
  );

  server.tool(
    "connect",
    "Connect an output port to an input port of the same type. Fails if the input already has an edge " +
      "or the edge would create a cycle.",
    connectSchema,
    async (input) => respond("connecting", () => executeConnect(graph, input)),
  );

  server.tool(
    "disconnect",
    "Remove an edge by id.",
    disconnectSchema,
    async ({ edge }) => respond("disconnecting", () => executeDisconnect(graph, edge)),
  );

  server.tool(
    "describe_graph",
    "Describe the nodes, edges, bindings, current port values and evaluation order.",
    describeGraphSchema,
    async ({ node }) => respond("describing graph", () => executeDescribeGraph(graph, bindings, node)),
  );

  // -------------------------------------------------------------------------
  // Bindings and learn mode
  // -------------------------------------------------------------------------

  server.tool(
    "bind",
    "Bind a control (device, channel, controlId) to a node's input port. Replaces any previous binding of that control.",
    bindSchema,
    async (input) => respond("binding", () => executeBind(bindings, input)),
  );

  server.tool(
    "unbind",
    "Remove the binding of a control.",
    unbindSchema,
    async (triple) => respond("unbinding", () => executeUnbind(bindings, triple)),
  );

  server.tool(
    "list_bindings",
    "List control bindings, optionally for one node.",
    listBindingsSchema,
    async ({ node }) => respond("listing bindings", () => executeListBindings(bindings, node)),
  );

  server.tool(
    "start_learning",
    "Put an input port in learn mode: the next matching control event is bound to it instead of being evaluated.",
    startLearningSchema,
    async (input) => respond("starting learn mode", () => executeStartLearning(learner, input)),
  );

  server.tool("cancel_learning", "Leave learn mode without binding anything.", async () =>
    respond("cancelling learn mode", () => executeCancelLearning(learner)),
  );

  server.tool("learn_status", "Show whether learn mode is waiting for a control.", async () =>
    respond("reading learn status", () => formatLearnState(learner.status)),
  );

  server.tool(
    "deliver_event",
    "Feed a control event into the engine as if a controller sent it, and report what it reached.",
    deliverEventSchema,
    async (input) => respond("delivering event", () => executeDeliverEvent(session, input)),
  );

  // -------------------------------------------------------------------------
  // Profiles
  // -------------------------------------------------------------------------

  server.tool(
    "save_profile",
    "Save the bindings that target a node as a reusable profile.",
    saveProfileSchema,
    async ({ name, node }) => respond("saving profile", () => executeSaveProfile(session, name, node)),
  );

  server.tool(
    "apply_profile",
    "Bind every entry of a profile to the same-named input ports of a node.",
    applyProfileSchema,
    async ({ profile, node }) => respond("applying profile", () => executeApplyProfile(session, profile, node)),
  );

  server.tool("list_profiles", "List saved profiles.", async () =>
    respond("listing profiles", () => executeListProfiles(session)),
  );

  server.tool(
    "delete_profile",
    "Delete a profile. Bindings it created stay in place.",
    deleteProfileSchema,
    async ({ profile }) => respond("deleting profile", () => executeDeleteProfile(session, profile)),
  );

  // -------------------------------------------------------------------------
  // Workspace and presets
  // -------------------------------------------------------------------------

  server.tool(
    "save_workspace",
    "Save the graph, bindings and profiles to a JSON workspace file.",
    workspacePathSchema,
    async ({ path }) => respond("saving workspace", () => executeSaveWorkspace(session, path)),
  );

  server.tool(
    "load_workspace",
    "Replace the current workspace with one loaded from a JSON file.",
    workspacePathSchema,
    async ({ path }) => respond("loading workspace", () => executeLoadWorkspace(session, path)),
  );

  server.tool("list_presets", "List the built-in workspace presets.", async () =>
    respond("listing presets", () => executeListPresets()),
  );

  server.tool(
    "load_preset",
    "Replace the current workspace with a built-in preset.",
    loadPresetSchema,
    async ({ preset }) => respond("loading preset", () => executeLoadPreset(session, preset)),
  );

  // -------------------------------------------------------------------------
  // Devices and diagnostics
  // -------------------------------------------------------------------------

  server.tool("list_devices", "List the built-in controller layouts.", async () =>
    respond("listing devices", () => executeListDevices()),
  );

  server.tool(
    "create_device_profile",
    "Create a profile binding every control of a built-in controller layout to a port named after the control.",
    createDeviceProfileSchema,
    async (input) => respond("creating device profile", () => executeCreateDeviceProfile(session, input)),
  );

  server.tool("list_audio_sinks", "List the audio sinks a Volume node can target.", async () =>
    respond("listing audio sinks", () => executeListAudioSinks(session)),
  );

  server.tool(
    "get_diagnostics",
    "Show recent action outcomes, attached sources and learn state.",
    getDiagnosticsSchema,
    async ({ limit, failuresOnly }) =>
      respond("reading diagnostics", () => executeGetDiagnostics(session, limit, failuresOnly)),
  );

  return server;
}
