/**
 * Built-in controller layouts. A layout says what each physical control
 * sends, so a profile and a matching MidiInput node can be built from it.
 */

export type ControlType = "fader" | "pot" | "button";

/** Faders and pots feed number ports; buttons feed trigger ports. */
export type ControlBehavior = "continuous" | "trigger";

export interface DeviceControl {
  /** Also the name of the MidiInput port the control binds to */
  name: string;
  type: ControlType;
  /** CC number, or note number for buttons */
  controlId: number;
  behavior: ControlBehavior;
}

export interface DeviceLayout {
  name: string;
  label: string;
  /** Channel the controller sends on out of the box */
  midiChannel: number;
  controls: readonly DeviceControl[];
}
