import { describe, it, expect, vi } from "vitest";
import { Graph } from "../../src/core/graph.js";
import { isGraphError } from "../../src/core/errors.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isGraphError(error) ? error.code : `non-graph error: ${String(error)}`;
  }
  return undefined;
}

function mixer(graph: Graph) {
  const input = graph.addNode("MidiInput", {
    ports: [
      { name: "fader", type: "number" },
      { name: "pad", type: "trigger" },
    ],
  });
  const map = graph.addNode("ValueMap", {});
  const volume = graph.addNode("Volume", {});
  return { input, map, volume };
}

describe("Graph nodes", () => {
  it("assigns increasing ids and keeps creation order", () => {
    const graph = new Graph();
    const { input, map, volume } = mixer(graph);
    expect([input, map, volume]).toEqual([1, 2, 3]);
    expect(graph.nodes().map((n) => n.id)).toEqual([1, 2, 3]);
    expect(graph.requireNode(map).title).toBe("ValueMap");
  });

  it("fills config defaults", () => {
    const graph = new Graph();
    const id = graph.addNode("ValueMap", { outMax: 100 });
    const node = graph.requireNode(id);
    expect(node.kind).toBe("ValueMap");
    expect(node.config).toMatchObject({ inMin: 0, inMax: 127, outMin: 0, outMax: 100, curve: "linear" });
  });

  it("rejects invalid configs with InvalidConfig", () => {
    const graph = new Graph();
    expect(codeOf(() => graph.addNode("ValueMap", { inMin: 5, inMax: 5 }))).toBe("InvalidConfig");
    expect(codeOf(() => graph.addNode("ValueMap", { curve: "piecewise", points: [[0, 0]] }))).toBe(
      "InvalidConfig",
    );
    expect(codeOf(() => graph.addNode("ShellCommand", { command: "  " }))).toBe("InvalidConfig");
    expect(codeOf(() => graph.addNode("Script", { source: "return (" }))).toBe("InvalidConfig");
    expect(
      codeOf(() =>
        graph.addNode("MidiInput", {
          ports: [
            { name: "a", type: "number" },
            { name: "a", type: "trigger" },
          ],
        }),
      ),
    ).toBe("InvalidConfig");
    expect(graph.size).toBe(0);
  });

  it("exposes MidiInput ports as inputs and outputs", () => {
    const graph = new Graph();
    const id = graph.addNode("MidiInput", { ports: [{ name: "fader", type: "number" }] });
    expect(graph.ports(id)).toEqual([
      { name: "fader", direction: "input", type: "number" },
      { name: "fader", direction: "output", type: "number" },
    ]);
  });

  it("removing a node removes its edges", () => {
    const graph = new Graph();
    const { input, map, volume } = mixer(graph);
    graph.connect({ node: input, port: "fader" }, { node: map, port: "in" });
    graph.connect({ node: map, port: "out" }, { node: volume, port: "level" });
    graph.removeNode(map);
    expect(graph.edges()).toEqual([]);
    expect(graph.getNode(map)).toBeUndefined();
    expect(codeOf(() => graph.removeNode(map))).toBe("UnknownNode");
  });

  it("never reuses ids after removal", () => {
    const graph = new Graph();
    const first = graph.addNode("ValueMap", {});
    graph.removeNode(first);
    expect(graph.addNode("ValueMap", {})).toBe(2);
  });
});

describe("Graph connect", () => {
  it("connects matching ports", () => {
    const graph = new Graph();
    const { input, map } = mixer(graph);
    const edge = graph.connect({ node: input, port: "fader" }, { node: map, port: "in" });
    expect(graph.getEdge(edge)).toEqual({
      id: edge,
      from: { node: input, port: "fader" },
      to: { node: map, port: "in" },
    });
    expect(graph.isTerminal(input)).toBe(false);
    expect(graph.isTerminal(map)).toBe(true);
  });

  it("rejects mismatched types and wrong directions", () => {
    const graph = new Graph();
    const { input, map, volume } = mixer(graph);
    expect(codeOf(() => graph.connect({ node: input, port: "pad" }, { node: map, port: "in" }))).toBe(
      "TypeMismatch",
    );
    expect(codeOf(() => graph.connect({ node: volume, port: "level" }, { node: map, port: "in" }))).toBe(
      "TypeMismatch",
    );
    expect(codeOf(() => graph.connect({ node: input, port: "nope" }, { node: map, port: "in" }))).toBe(
      "UnknownPort",
    );
    expect(codeOf(() => graph.connect({ node: 99, port: "out" }, { node: map, port: "in" }))).toBe(
      "UnknownNode",
    );
    expect(graph.edges()).toEqual([]);
  });

  it("allows one incoming edge per input", () => {
    const graph = new Graph();
    const { input, volume } = mixer(graph);
    const other = graph.addNode("ValueMap", {});
    const map = graph.addNode("ValueMap", {});
    graph.connect({ node: input, port: "fader" }, { node: map, port: "in" });
    graph.connect({ node: map, port: "out" }, { node: volume, port: "level" });
    expect(
      codeOf(() => graph.connect({ node: other, port: "out" }, { node: volume, port: "level" })),
    ).toBe("PortOccupied");
  });

  it("rejects cycles and self-loops, leaving the graph unchanged", () => {
    const graph = new Graph();
    const a = graph.addNode("ValueMap", {});
    const b = graph.addNode("ValueMap", {});
    const c = graph.addNode("ValueMap", {});
    graph.connect({ node: a, port: "out" }, { node: b, port: "in" });
    graph.connect({ node: b, port: "out" }, { node: c, port: "in" });
    expect(codeOf(() => graph.connect({ node: c, port: "out" }, { node: a, port: "in" }))).toBe(
      "CycleDetected",
    );
    expect(codeOf(() => graph.connect({ node: a, port: "out" }, { node: a, port: "in" }))).toBe(
      "CycleDetected",
    );
    expect(graph.edges()).toHaveLength(2);
  });

  it("disconnect frees the input", () => {
    const graph = new Graph();
    const { input, map } = mixer(graph);
    const edge = graph.connect({ node: input, port: "fader" }, { node: map, port: "in" });
    graph.disconnect(edge);
    expect(graph.incomingEdge({ node: map, port: "in" })).toBeUndefined();
    expect(codeOf(() => graph.disconnect(edge))).toBe("UnknownEdge");
  });
});

describe("Graph topologicalOrder", () => {
  it("orders sources before destinations, breaking ties by creation order", () => {
    const graph = new Graph();
    const volume = graph.addNode("Volume", {});
    const map = graph.addNode("ValueMap", {});
    const input = graph.addNode("MidiInput", { ports: [{ name: "f", type: "number" }] });
    const lone = graph.addNode("ValueMap", {});
    graph.connect({ node: input, port: "f" }, { node: map, port: "in" });
    graph.connect({ node: map, port: "out" }, { node: volume, port: "level" });
    expect(graph.topologicalOrder()).toEqual([input, map, volume, lone]);
  });

  it("is cached until the structure changes", () => {
    const graph = new Graph();
    graph.addNode("ValueMap", {});
    const first = graph.topologicalOrder();
    expect(graph.topologicalOrder()).toBe(first);
    graph.addNode("ValueMap", {});
    expect(graph.topologicalOrder()).not.toBe(first);
    expect(graph.topologicalOrder()).toEqual([1, 2]);
  });
});

describe("Graph updateNodeConfig", () => {
  it("rejects dropping a connected port", () => {
    const graph = new Graph();
    const input = graph.addNode("MidiInput", { ports: [{ name: "f", type: "number" }] });
    const map = graph.addNode("ValueMap", {});
    graph.connect({ node: input, port: "f" }, { node: map, port: "in" });
    expect(codeOf(() => graph.updateNodeConfig(input, { ports: [{ name: "g", type: "number" }] }))).toBe(
      "InvalidConfig",
    );
    expect(graph.requireNode(input).config).toEqual({ ports: [{ name: "f", type: "number" }] });
  });

  it("reports dropped input ports to listeners", () => {
    const graph = new Graph();
    const input = graph.addNode("MidiInput", {
      ports: [
        { name: "f", type: "number" },
        { name: "g", type: "number" },
      ],
    });
    const listener = vi.fn();
    graph.onStructuralChange(listener);
    graph.updateNodeConfig(input, { ports: [{ name: "f", type: "number" }] }, { title: "Deck" });
    expect(listener).toHaveBeenCalledWith({ type: "config-changed", node: input, removedPorts: ["g"] });
    expect(graph.requireNode(input).title).toBe("Deck");
  });
});
