import dgram from "node:dgram";
import { afterEach, describe, it, expect } from "vitest";
import type { OscMessage } from "../../src/network/osc.js";
import { OscSource, oscToControlEvent } from "../../src/sources/osc-source.js";
import type { ControlEvent } from "../../src/types.js";
import { encodeOscMessage } from "../helpers/osc.js";

function message(address: string, ...values: number[]): OscMessage {
  return { address, args: values.map((value) => ({ type: "i" as const, value })) };
}

describe("oscToControlEvent", () => {
  it("turns /midi/cc into a continuous event", () => {
    expect(oscToControlEvent(message("/midi/cc", 1, 16, 100), "deck", 42)).toEqual({
      device: "deck",
      channel: 1,
      controlId: 16,
      rawValue: 100,
      kind: "continuous",
      timestamp: 42,
    });
  });

  it("turns a /midi/note press into a trigger and ignores releases", () => {
    expect(oscToControlEvent(message("/midi/note", 1, 36, 127), "deck", 1)?.kind).toBe("trigger");
    expect(oscToControlEvent(message("/midi/note", 1, 36, 0), "deck", 1)).toBeNull();
    expect(oscToControlEvent(message("/midi/noteoff", 1, 36, 64), "deck", 1)).toBeNull();
  });

  it("ignores messages with missing or string arguments", () => {
    expect(oscToControlEvent(message("/midi/cc", 1), "deck", 1)).toBeNull();
    expect(
      oscToControlEvent({ address: "/midi/cc", args: [{ type: "s", value: "1" }] }, "deck", 1),
    ).toBeNull();
  });
});

describe("OscSource", () => {
  let source: OscSource | undefined;

  afterEach(async () => {
    await source?.close();
    source = undefined;
  });

  it("receives UDP packets as control events", async () => {
    const listening = await OscSource.listen({ port: 0, device: "surface", now: () => 7 });
    source = listening;
    expect(listening.port).toBeGreaterThan(0);
    expect(listening.id).toBe(`osc:127.0.0.1:${listening.port}`);

    const iterator = listening.events()[Symbol.asyncIterator]();
    const next = iterator.next();

    const packet = encodeOscMessage("/midi/cc", message("/midi/cc", 2, 5, 64).args);
    const client = dgram.createSocket("udp4");
    await new Promise<void>((resolve, reject) =>
      client.send(packet, listening.port, "127.0.0.1", (error) => (error ? reject(error) : resolve())),
    );
    client.close();

    const result = await next;
    const expected: ControlEvent = {
      device: "surface",
      channel: 2,
      controlId: 5,
      rawValue: 64,
      kind: "continuous",
      timestamp: 7,
    };
    expect(result).toEqual({ value: expected, done: false });
  });

  it("ends its event sequence on close", async () => {
    source = await OscSource.listen({ port: 0 });
    const iterator = source.events()[Symbol.asyncIterator]();
    const next = iterator.next();
    await source.close();
    expect((await next).done).toBe(true);
  });
});
