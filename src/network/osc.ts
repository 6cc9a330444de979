/**
 * OSC (Open Sound Control) 1.0 packet decoder.
 *
 *   - Address: null-terminated, padded to 4-byte boundary
 *   - Type tag string: "," + one char per arg, padded to 4-byte boundary
 *   - Arguments: int32 / float32 big-endian, strings null-padded
 *
 * Bundles ("#bundle") are flattened into their messages.
 *
 * Reference: opensoundcontrol.org/spec-1_0
 */

export interface OscArgInt { type: "i"; value: number }
export interface OscArgFloat { type: "f"; value: number }
export interface OscArgString { type: "s"; value: string }

export type OscArg = OscArgInt | OscArgFloat | OscArgString;

export interface OscMessage {
  address: string;
  args: OscArg[];
}

function padded(length: number): number {
  return Math.ceil(length / 4) * 4;
}

function readString(buf: Buffer, offset: number): { value: string; next: number } {
  const end = buf.indexOf(0, offset);
  if (end === -1) throw new Error(`unterminated OSC string at byte ${offset}`);
  return { value: buf.toString("utf-8", offset, end), next: padded(end + 1) };
}

function readMessage(buf: Buffer): OscMessage {
  const address = readString(buf, 0);
  if (!address.value.startsWith("/")) {
    throw new Error(`OSC address must start with "/", got: "${address.value}"`);
  }
  if (address.next >= buf.length) return { address: address.value, args: [] };

  const tags = readString(buf, address.next);
  if (!tags.value.startsWith(",")) throw new Error("OSC type tag string must start with \",\"");

  const args: OscArg[] = [];
  let offset = tags.next;
  for (const tag of tags.value.slice(1)) {
    switch (tag) {
      case "i":
        if (offset + 4 > buf.length) throw new Error("OSC int32 argument truncated");
        args.push({ type: "i", value: buf.readInt32BE(offset) });
        offset += 4;
        break;
      case "f":
        if (offset + 4 > buf.length) throw new Error("OSC float32 argument truncated");
        args.push({ type: "f", value: buf.readFloatBE(offset) });
        offset += 4;
        break;
      case "s": {
        const s = readString(buf, offset);
        args.push({ type: "s", value: s.value });
        offset = s.next;
        break;
      }
      case "T":
        args.push({ type: "i", value: 1 });
        break;
      case "F":
        args.push({ type: "i", value: 0 });
        break;
      default:
        throw new Error(`unsupported OSC type tag "${tag}"`);
    }
  }
  return { address: address.value, args };
}

/**
 * Decode a UDP packet into OSC messages.
 * @throws On malformed packets
 */
export function decodeOscPacket(buf: Buffer): OscMessage[] {
  if (buf.length === 0 || buf.length % 4 !== 0) {
    throw new Error(`OSC packet size must be a non-zero multiple of 4, got ${buf.length}`);
  }
  const head = readString(buf, 0);
  if (head.value !== "#bundle") return [readMessage(buf)];

  const messages: OscMessage[] = [];
  let offset = head.next + 8;
  while (offset < buf.length) {
    if (offset + 4 > buf.length) throw new Error("OSC bundle element size truncated");
    const size = buf.readInt32BE(offset);
    offset += 4;
    if (size <= 0 || offset + size > buf.length) throw new Error("OSC bundle element overruns packet");
    messages.push(...decodeOscPacket(buf.subarray(offset, offset + size)));
    offset += size;
  }
  return messages;
}
