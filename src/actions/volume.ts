/**
 * Volume action: sets a named sink's level from the node's `level` input.
 */

import type { VolumeConfig } from "../core/node-kinds.js";
import { clamp } from "../core/value-map.js";
import { type AudioBackend, SinkNotFoundError } from "./audio-backend.js";
import type { ActionEffector, ActionOutcome, ActionRequest } from "./types.js";

export class VolumeAction implements ActionEffector<VolumeConfig> {
  constructor(private readonly backend: AudioBackend | null) {}

  async execute({ config, inputs, signal }: ActionRequest<VolumeConfig>): Promise<ActionOutcome> {
    const raw = inputs.level;
    if (typeof raw !== "number" || !Number.isFinite(raw)) {
      return { ok: false, reason: "rejected", message: `level input is not a number (${String(raw)})` };
    }
    if (!this.backend) {
      return {
        ok: false,
        reason: "not-found",
        message: "No supported volume backend found. Install PipeWire (wpctl) or PulseAudio (pactl).",
      };
    }

    const level = clamp(raw, 0, 1);
    try {
      await this.backend.setLevel(config.sink, level, signal);
    } catch (error) {
      if (error instanceof SinkNotFoundError) {
        return { ok: false, reason: "not-found", message: error.message };
      }
      return {
        ok: false,
        reason: signal.aborted ? "timeout" : "exception",
        message: error instanceof Error ? error.message : String(error),
      };
    }
    return { ok: true, detail: `${config.sink} set to ${level.toFixed(3)}` };
  }
}
