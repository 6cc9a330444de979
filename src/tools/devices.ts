/**
 * Device layout tools: list_devices, create_device_profile.
 */

import { getDevice, listDevices, midiInputConfigFor, profileFromDevice } from "../devices/index.js";
import type { Session } from "../runtime/session.js";
import type { CreateDeviceProfileInput } from "../schemas/workspace.js";
import { formatProfile } from "./format.js";

export function executeListDevices(): string {
  return listDevices()
    .map((layout) => {
      const counts = new Map<string, number>();
      for (const c of layout.controls) counts.set(c.type, (counts.get(c.type) ?? 0) + 1);
      const summary = [...counts].map(([type, n]) => `${n} ${type}s`).join(", ");
      return `${layout.name}: ${layout.label}, channel ${layout.midiChannel} (${summary})`;
    })
    .join("\n");
}

export function executeCreateDeviceProfile(session: Session, input: CreateDeviceProfileInput): string {
  const layout = getDevice(input.device);
  const { name, entries } = profileFromDevice(layout, input.deviceId, input.channel);
  const profile = session.profiles.add(name, entries);
  const lines = [`Created profile ${formatProfile(profile)}`];

  if (input.createNode) {
    const node = session.graph.addNode("MidiInput", midiInputConfigFor(layout), { title: layout.label });
    const { applied } = session.profiles.apply(profile.id, session.graph, session.bindings, node);
    lines.push(`Added MidiInput node #${node} with ${applied.length} bound ports`);
  }
  return lines.join("\n");
}
