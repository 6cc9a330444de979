/**
 * OSC over UDP event source, for software control surfaces.
 *
 *   /midi/cc      <channel> <control> <value>   → continuous event
 *   /midi/note    <channel> <note> <velocity>   → trigger event (velocity > 0)
 *   /midi/noteoff <channel> <note> [velocity]   → ignored
 */

import dgram from "node:dgram";

import { decodeOscPacket, type OscArg, type OscMessage } from "../network/osc.js";
import type { Logger } from "../runtime/logger.js";
import { silentLogger } from "../runtime/logger.js";
import type { ControlEvent } from "../types.js";
import { EventQueue } from "./event-queue.js";
import type { EventSource } from "./types.js";

export interface OscSourceOptions {
  port: number;
  host?: string;
  /** Fixed device id; defaults to "osc:<sender-host>:<sender-port>" */
  device?: string;
  id?: string;
  now?: () => number;
  logger?: Logger;
}

function numeric(arg: OscArg | undefined): number | null {
  if (!arg || arg.type === "s") return null;
  return Number.isFinite(arg.value) ? arg.value : null;
}

/** Translate one OSC message into a control event, or null when it carries none. */
export function oscToControlEvent(
  message: OscMessage,
  device: string,
  timestamp: number,
): ControlEvent | null {
  const [channel, controlId, value] = [0, 1, 2].map((i) => numeric(message.args[i]));
  if (channel === null || controlId === null) return null;

  switch (message.address) {
    case "/midi/cc":
      if (value === null) return null;
      return { device, channel, controlId, rawValue: value, kind: "continuous", timestamp };
    case "/midi/note":
      if (value === null || value <= 0) return null;
      return { device, channel, controlId, rawValue: value, kind: "trigger", timestamp };
    default:
      return null;
  }
}

export class OscSource implements EventSource {
  readonly id: string;
  private readonly queue = new EventQueue();
  private readonly now: () => number;
  private readonly logger: Logger;

  private constructor(
    private readonly socket: dgram.Socket,
    private readonly options: OscSourceOptions,
  ) {
    this.id = options.id ?? `osc:${options.host ?? "127.0.0.1"}:${options.port}`;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    socket.on("message", (msg, rinfo) => this.onPacket(msg, `osc:${rinfo.address}:${rinfo.port}`));
    socket.on("error", (error) => {
      this.logger.error(`OSC source ${this.id} socket error`, { error });
    });
  }

  /** Bind a UDP socket and start accepting packets. Port 0 picks a free port. */
  static listen(options: OscSourceOptions): Promise<OscSource> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket("udp4");
      const onError = (error: Error) => {
        socket.close();
        reject(error);
      };
      socket.once("error", onError);
      socket.bind(options.port, options.host ?? "127.0.0.1", () => {
        socket.off("error", onError);
        resolve(new OscSource(socket, { ...options, port: socket.address().port }));
      });
    });
  }

  get port(): number {
    return this.options.port;
  }

  events(): AsyncIterable<ControlEvent> {
    return this.queue.iterate();
  }

  close(): Promise<void> {
    if (this.queue.isClosed) return Promise.resolve();
    this.queue.close();
    return new Promise((resolve) => this.socket.close(() => resolve()));
  }

  private onPacket(packet: Buffer, sender: string): void {
    let messages: OscMessage[];
    try {
      messages = decodeOscPacket(packet);
    } catch (error) {
      this.logger.warn(`ignoring malformed OSC packet from ${sender}`, { error });
      return;
    }
    const device = this.options.device ?? sender;
    for (const message of messages) {
      const event = oscToControlEvent(message, device, this.now());
      if (event) this.queue.push(event);
    }
  }
}
