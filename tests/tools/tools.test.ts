import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { z } from "zod";
import type { Session } from "../../src/runtime/session.js";
import { disconnectSchema } from "../../src/schemas/graph.js";
import { respond } from "../../src/server.js";
import {
  executeBind,
  executeCancelLearning,
  executeListBindings,
  executeStartLearning,
  executeUnbind,
  formatLearnState,
} from "../../src/tools/bindings.js";
import { executeListAudioSinks } from "../../src/tools/audio.js";
import { executeCreateDeviceProfile, executeListDevices } from "../../src/tools/devices.js";
import { executeGetDiagnostics } from "../../src/tools/diagnostics.js";
import { executeDeliverEvent } from "../../src/tools/events.js";
import { formatDispatch, formatValue } from "../../src/tools/format.js";
import {
  executeAddNode,
  executeConnect,
  executeDescribeGraph,
  executeDisconnect,
  executeRemoveNode,
} from "../../src/tools/graph.js";
import {
  executeApplyProfile,
  executeDeleteProfile,
  executeListProfiles,
  executeLoadPreset,
  executeSaveProfile,
  executeSaveWorkspace,
} from "../../src/tools/workspace.js";
import { type EffectorCall, openSession } from "../helpers/session.js";

const deck = { device: "test-deck", channel: 1 };

let session: Session;
let calls: EffectorCall[];

beforeEach(async () => {
  ({ session, calls } = await openSession());
});

afterEach(async () => {
  await session.shutdown();
});

function faderToVolume() {
  executeAddNode(session.graph, {
    kind: "MidiInput",
    config: { ports: [{ name: "fader", type: "number" }] },
    title: "Deck",
  });
  executeAddNode(session.graph, { kind: "Volume", config: {} });
  executeConnect(session.graph, { fromNode: 1, fromPort: "fader", toNode: 2, toPort: "level" });
}

describe("graph tools", () => {
  it("takes a positive edge id for disconnect", () => {
    const schema = z.object(disconnectSchema);
    expect(schema.safeParse({ edge: 1 }).success).toBe(true);
    expect(schema.safeParse({ edge: 0 }).success).toBe(false);
    expect(disconnectSchema.edge.description).toBe("Edge id, as shown by describe_graph.");
  });

  it("renders an added node with its ports and config", () => {
    const text = executeAddNode(session.graph, {
      kind: "MidiInput",
      config: { ports: [{ name: "fader", type: "number" }] },
      title: "Deck",
    });
    expect(text).toBe(
      [
        "Added node",
        "#1 Deck [MidiInput]",
        "  in:  fader:number=-",
        "  out: fader:number=-",
        '  config: {"ports":[{"name":"fader","type":"number"}]}',
      ].join("\n"),
    );
  });

  it("connects, describes and disconnects", () => {
    faderToVolume();
    expect(executeDescribeGraph(session.graph, session.bindings, 2)).toBe(
      ["#2 Volume [Volume]", "  in:  level:number=-", '  config: {"sink":"@DEFAULT_AUDIO_SINK@"}', "  edge 1: 1.fader → 2.level"].join(
        "\n",
      ),
    );
    expect(executeDisconnect(session.graph, 1)).toBe("Disconnected edge 1: 1.fader → 2.level");
    expect(session.graph.edges()).toEqual([]);
  });

  it("describes the whole graph with its evaluation order", () => {
    faderToVolume();
    const text = executeDescribeGraph(session.graph, session.bindings);
    expect(text.split("\n").at(-1)).toBe("Evaluation order: 1 → 2");
  });

  it("reports what a removal took with it", () => {
    faderToVolume();
    executeBind(session.bindings, { ...deck, controlId: 7, node: 1, port: "fader" });
    expect(executeRemoveNode(session.graph, session.bindings, 1)).toBe("Removed node #1 Deck (1 edges, 1 bindings)");
    expect(session.bindings.size).toBe(0);
  });

  it("describes an empty graph", () => {
    expect(executeDescribeGraph(session.graph, session.bindings)).toBe("Graph is empty.");
  });
});

describe("binding tools", () => {
  beforeEach(faderToVolume);

  it("binds, rebinds and unbinds a control", () => {
    executeAddNode(session.graph, { kind: "MidiInput", config: { ports: [{ name: "knob", type: "number" }] } });
    expect(executeBind(session.bindings, { ...deck, controlId: 7, node: 1, port: "fader" })).toBe(
      "Bound test-deck ch1 #7 → 1.fader",
    );
    expect(executeBind(session.bindings, { ...deck, controlId: 7, node: 3, port: "knob" })).toBe(
      "Bound test-deck ch1 #7 → 3.knob\n  (was → 1.fader)",
    );
    expect(executeListBindings(session.bindings)).toBe("Bindings (1):\n  test-deck ch1 #7 → 3.knob");
    expect(executeListBindings(session.bindings, 1)).toBe("No bindings.");
    expect(executeUnbind(session.bindings, { ...deck, controlId: 7 })).toBe("Unbound test-deck ch1 #7");
    expect(executeUnbind(session.bindings, { ...deck, controlId: 7 })).toBe("No binding for test-deck ch1 #7");
  });

  it("formats learn mode state", () => {
    const state = session.learner.start({ node: 1, port: "fader" }, { sourceId: "osc:a" });
    if (state.state !== "learning") throw new Error("expected learn mode");
    expect(formatLearnState(state, state.startedAt + 3_000)).toBe(
      "Learn mode: waiting for a continuous control from osc:a → 1.fader (3s)",
    );
    expect(executeCancelLearning(session.learner)).toBe("Learn mode cancelled.");
    expect(formatLearnState(session.learner.status)).toBe("Learn mode: idle");
  });

  it("learns a control delivered through the event tool", async () => {
    executeStartLearning(session.learner, { node: 1, port: "fader" });
    const learned = await executeDeliverEvent(session, {
      ...deck,
      controlId: 12,
      rawValue: 40,
      kind: "continuous",
      wait: true,
    });
    expect(learned).toBe("Learned: test-deck ch1 #12 → 1.fader");
  });
});

describe("deliver_event", () => {
  it("reports routing, activations and action outcomes", async () => {
    faderToVolume();
    executeBind(session.bindings, { ...deck, controlId: 7, node: 1, port: "fader" });

    const text = await executeDeliverEvent(session, {
      ...deck,
      controlId: 7,
      rawValue: 0.25,
      kind: "continuous",
      wait: true,
    });
    const lines = text.split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "Routed via test-deck ch1 #7 → 1.fader",
      "Evaluated: #1, #2",
      "Activated Volume #2 (level=0.25)",
    ]);
    expect(lines[3]).toMatch(/^Volume #2 Volume: ok \(\d+ms\) Volume done$/);
    expect(calls).toEqual([{ kind: "Volume", inputs: { level: 0.25 } }]);
  });

  it("reports dropped events", async () => {
    const text = await executeDeliverEvent(session, { ...deck, controlId: 99, rawValue: 1, kind: "continuous", wait: true });
    expect(text).toBe("Dropped: unbound control");
  });

  it("shows the outcome in diagnostics", async () => {
    faderToVolume();
    executeBind(session.bindings, { ...deck, controlId: 7, node: 1, port: "fader" });
    await executeDeliverEvent(session, { ...deck, controlId: 7, rawValue: 1, kind: "continuous", wait: true });

    const lines = executeGetDiagnostics(session, 20, false).split("\n");
    expect(lines.slice(0, 5)).toEqual([
      "Sources: none",
      "Queued events: 0",
      "Learn mode: idle",
      "",
      "Recent actions (1):",
    ]);
    expect(executeGetDiagnostics(session, 20, true).split("\n")[4]).toBe("No action reports.");
  });
});

describe("profile and preset tools", () => {
  it("saves, lists, applies and deletes profiles", () => {
    faderToVolume();
    executeBind(session.bindings, { ...deck, controlId: 7, node: 1, port: "fader" });
    expect(executeSaveProfile(session, "My Deck", 1)).toBe("Saved profile my-deck: My Deck (1 entries)");
    expect(executeListProfiles(session)).toBe("Profiles (1):\n  my-deck: My Deck (1 entries)");

    executeAddNode(session.graph, {
      kind: "MidiInput",
      config: {
        ports: [
          { name: "fader", type: "number" },
          { name: "spare", type: "number" },
        ],
      },
    });
    expect(executeApplyProfile(session, "my-deck", 3)).toBe(
      'Applied profile "my-deck" to node #3: 1 bound, 0 skipped\n  test-deck ch1 #7 → 3.fader',
    );
    expect(executeDeleteProfile(session, "my-deck")).toBe('Deleted profile "my-deck"');
    expect(executeDeleteProfile(session, "my-deck")).toBe('No profile "my-deck"');
    expect(executeListProfiles(session)).toBe("No profiles.");
  });

  it("builds a profile and input node from a device layout", () => {
    const text = executeCreateDeviceProfile(session, { device: "k2", deviceId: "usb-k2", createNode: true });
    expect(text).toBe(
      [
        "Created profile allen-heath-xone-k2-usb-k2: Allen & Heath Xone:K2 (usb-k2) (32 entries)",
        "Added MidiInput node #1 with 32 bound ports",
      ].join("\n"),
    );
    expect(session.bindings.size).toBe(32);
  });

  it("lists the device layouts", () => {
    expect(executeListDevices()).toBe("xone-k2: Allen & Heath Xone:K2, channel 16 (4 faders, 12 pots, 16 buttons)");
  });

  it("loads a preset that routes a fader to volume", async () => {
    expect(await executeLoadPreset(session, "default-mixer")).toBe(
      'Loaded preset "Mixer Controller" (4 nodes, 2 bindings)',
    );
    await executeDeliverEvent(session, {
      device: "xone-k2",
      channel: 16,
      controlId: 16,
      rawValue: 127,
      kind: "continuous",
      wait: true,
    });
    expect(calls).toEqual([{ kind: "Volume", inputs: { level: 1 } }]);
  });

  it("needs a path to save when none is configured", async () => {
    await expect(executeSaveWorkspace(session)).rejects.toThrow("No path given and MIDI_GRAPH_WORKSPACE is not set");
  });
});

describe("list_audio_sinks", () => {
  it("says so when no backend was found", async () => {
    expect(await executeListAudioSinks(session)).toBe("No audio backend found (wpctl or pactl).");
  });

  it("lists the backend's sinks", async () => {
    const { session: withAudio } = await openSession(
      {},
      {
        audioBackend: {
          name: "pactl",
          setLevel: async () => {},
          listSinks: async () => [
            { id: "@DEFAULT_AUDIO_SINK@", name: "System Default Output", kind: "default" },
            { id: "3", name: "speakers", kind: "sink" },
          ],
        },
      },
    );
    try {
      expect(await executeListAudioSinks(withAudio)).toBe(
        ["Audio sinks (pactl):", "  @DEFAULT_AUDIO_SINK@: System Default Output (alias)", "  3: speakers"].join("\n"),
      );
    } finally {
      await withAudio.shutdown();
    }
  });
});

describe("formatting", () => {
  it("quotes strings and marks unset values", () => {
    expect(formatValue(undefined)).toBe("-");
    expect(formatValue("on")).toBe('"on"');
    expect(formatValue(null)).toBe("null");
  });

  it("renders a dispatch without actions", () => {
    expect(formatDispatch({ status: "evaluated", evaluated: [1], activations: [] })).toBe(
      "Routed via binding\nEvaluated: #1\nNo actions triggered.",
    );
  });

  it("turns thrown errors into error results", async () => {
    const result = await respond("connecting", () => {
      throw new Error("port occupied");
    });
    expect(result).toEqual({
      content: [{ type: "text", text: "Error connecting: port occupied" }],
      isError: true,
    });
  });
});
