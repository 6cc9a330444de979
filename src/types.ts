/**
 * Shared types for the control graph: events, ports, nodes, edges, bindings.
 */

// ---------------------------------------------------------------------------
// Control events
// ---------------------------------------------------------------------------

export type ControlEventKind = "trigger" | "continuous";

/** A normalized message from a hardware or virtual control surface. */
export interface ControlEvent {
  /** Device identifier, e.g. "xone-k2" or "osc:127.0.0.1:9000" */
  device: string;
  /** MIDI channel (1-16) */
  channel: number;
  /** CC number for continuous controls, note number for triggers */
  controlId: number;
  rawValue: number;
  kind: ControlEventKind;
  /** Milliseconds; non-decreasing per device */
  timestamp: number;
  /** Id of the event source that produced the event, when known */
  sourceId?: string;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

export type NodeId = number;
export type EdgeId = number;

export type PortType = "number" | "trigger" | "string";
export type PortDirection = "input" | "output";

/** Current value held by a port. Trigger ports hold their firing count. */
export type PortValue = number | string | null;

export interface PortSpec {
  name: string;
  direction: PortDirection;
  type: PortType;
}

export interface PortRef {
  node: NodeId;
  port: string;
}

export interface Edge {
  id: EdgeId;
  from: PortRef;
  to: PortRef;
}

// ---------------------------------------------------------------------------
// Bindings
// ---------------------------------------------------------------------------

/** Physical identity of a control. */
export interface ControlTriple {
  device: string;
  channel: number;
  controlId: number;
}

export interface Binding extends ControlTriple {
  target: PortRef;
}
