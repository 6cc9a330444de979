/**
 * Allen & Heath Xone:K2 layout.
 *
 * Physical layout per column (4 columns):
 *   Encoder (top) → 3 pots → 4 buttons (A-D) → Fader (bottom)
 *
 * Encoders send relative values and are left out.
 */

import type { DeviceControl, DeviceLayout } from "./types.js";

const faders: DeviceControl[] = [16, 17, 18, 19].map((cc, i) => ({
  name: `fader${i + 1}`,
  type: "fader",
  controlId: cc,
  behavior: "continuous",
}));

// Three rows of four, CC 4-15 left to right, top to bottom
const pots: DeviceControl[] = Array.from({ length: 12 }, (_, i) => ({
  name: `pot${i + 1}`,
  type: "pot",
  controlId: 4 + i,
  behavior: "continuous",
}));

// Button rows A-D; row A sits highest on the note map
const BUTTON_ROWS = [
  ["A", 36],
  ["B", 32],
  ["C", 28],
  ["D", 24],
] as const;

const buttons: DeviceControl[] = BUTTON_ROWS.flatMap(([row, first]) =>
  [0, 1, 2, 3].map(
    (col): DeviceControl => ({
      name: `button${row}${col + 1}`,
      type: "button",
      controlId: first + col,
      behavior: "trigger",
    }),
  ),
);

export const k2Layout: DeviceLayout = {
  name: "xone-k2",
  label: "Allen & Heath Xone:K2",
  midiChannel: 16,
  controls: [...faders, ...pots, ...buttons],
};
