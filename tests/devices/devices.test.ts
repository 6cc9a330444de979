import { describe, it, expect } from "vitest";
import { BindingTable } from "../../src/core/bindings.js";
import { Graph } from "../../src/core/graph.js";
import { ProfileStore } from "../../src/core/profiles.js";
import { getDevice, listDevices, midiInputConfigFor, profileFromDevice } from "../../src/devices/index.js";

describe("device layouts", () => {
  it("resolves the K2 by name and alias", () => {
    expect(getDevice("xone-k2")).toBe(getDevice("K2"));
    expect(listDevices().map((d) => d.name)).toEqual(["xone-k2"]);
  });

  it("rejects unknown devices", () => {
    expect(() => getDevice("launchpad")).toThrow('Unknown device "launchpad". Available devices: xone-k2');
  });

  it("describes 4 faders, 12 pots and 16 buttons", () => {
    const k2 = getDevice("k2");
    const count = (type: string) => k2.controls.filter((c) => c.type === type).length;
    expect([count("fader"), count("pot"), count("button")]).toEqual([4, 12, 16]);
    expect(k2.controls.find((c) => c.name === "buttonA1")?.controlId).toBe(36);
    expect(k2.controls.find((c) => c.name === "buttonD4")?.controlId).toBe(27);
    expect(k2.controls.find((c) => c.name === "pot12")?.controlId).toBe(15);
  });
});

describe("profileFromDevice", () => {
  it("binds each control to the port of the same name", () => {
    const profile = profileFromDevice(getDevice("k2"), "usb-k2", 15);
    expect(profile.name).toBe("Allen & Heath Xone:K2 (usb-k2)");
    expect(profile.entries).toHaveLength(32);
    expect(profile.entries[0]).toEqual({ device: "usb-k2", channel: 15, controlId: 16, port: "fader1" });
  });

  it("applies cleanly to a MidiInput built from the same layout", () => {
    const layout = getDevice("k2");
    const graph = new Graph();
    const bindings = new BindingTable(graph);
    const profiles = new ProfileStore();
    const node = graph.addNode("MidiInput", midiInputConfigFor(layout));
    const { name, entries } = profileFromDevice(layout, "usb-k2");
    const profile = profiles.add(name, entries);

    const result = profiles.apply(profile.id, graph, bindings, node);
    expect(result.skipped).toEqual([]);
    expect(bindings.size).toBe(32);
    expect(bindings.resolve({ device: "usb-k2", channel: 16, controlId: 36 })?.target.port).toBe("buttonA1");
    expect(graph.requirePort({ node, port: "buttonA1" }, "input").type).toBe("trigger");
  });
});
