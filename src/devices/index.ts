/**
 * Device layout registry, and the profiles and MidiInput configs built from a layout.
 */

import type { MidiInputConfig } from "../core/node-kinds.js";
import type { Profile, ProfileEntry } from "../core/profiles.js";
import type { DeviceLayout } from "./types.js";
import { k2Layout } from "./k2.js";

export type { DeviceControl, DeviceLayout } from "./types.js";

const devices = new Map<string, DeviceLayout>([
  [k2Layout.name, k2Layout],
  ["k2", k2Layout], // alias
]);

export function listDevices(): DeviceLayout[] {
  return [...new Set(devices.values())];
}

/**
 * Look up a device layout by name.
 * Throws if the device name is not recognized.
 */
export function getDevice(name: string): DeviceLayout {
  const layout = devices.get(name.toLowerCase());
  if (!layout) {
    const available = listDevices().map((d) => d.name);
    throw new Error(`Unknown device "${name}". Available devices: ${available.join(", ")}`);
  }
  return layout;
}

/**
 * Profile binding every control of a layout to the port named after it.
 * `deviceId` is the device string the event source reports.
 */
export function profileFromDevice(
  layout: DeviceLayout,
  deviceId: string,
  channel = layout.midiChannel,
): Omit<Profile, "id"> {
  const entries: ProfileEntry[] = layout.controls.map((control) => ({
    device: deviceId,
    channel,
    controlId: control.controlId,
    port: control.name,
  }));
  return { name: `${layout.label} (${deviceId})`, entries };
}

/** MidiInput config with one port per control, typed by how the control behaves. */
export function midiInputConfigFor(layout: DeviceLayout): MidiInputConfig {
  return {
    ports: layout.controls.map((control) => ({
      name: control.name,
      type: control.behavior === "trigger" ? "trigger" : "number",
    })),
  };
}
