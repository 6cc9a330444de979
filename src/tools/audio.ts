/**
 * list_audio_sinks tool: the values a Volume node's `sink` accepts.
 */

import type { Session } from "../runtime/session.js";

export async function executeListAudioSinks(session: Session): Promise<string> {
  const backend = session.audio;
  if (!backend) return "No audio backend found (wpctl or pactl).";
  const sinks = await backend.listSinks();
  return [
    `Audio sinks (${backend.name}):`,
    ...sinks.map((sink) => `  ${sink.id}: ${sink.name}${sink.kind === "default" ? " (alias)" : ""}`),
  ].join("\n");
}
