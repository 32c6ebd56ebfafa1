/**
 * @fileoverview Packet framing (RFC 9580 §4.2).
 *
 * Splits a binary stream into tagged bodies. Any framing problem is a
 * stream-level failure: once a length is wrong every later boundary is
 * wrong too.
 *
 * @module packets/reader
 */

import type { RawPacket } from "~/types";
import { PacketDecodeError } from "~/utils/errors";

function need(data: Uint8Array, offset: number, length: number): void {
  if (offset + length > data.length) {
    throw new PacketDecodeError("Packet runs past end of data", {
      offset,
      length,
      available: data.length - offset,
    });
  }
}

function readU32(data: Uint8Array, offset: number): number {
  need(data, offset, 4);
  return (
    (((data[offset] ?? 0) << 24) | ((data[offset + 1] ?? 0) << 16)
      | ((data[offset + 2] ?? 0) << 8) | (data[offset + 3] ?? 0)) >>> 0
  );
}

function concat(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 1 && chunks[0]) return chunks[0];
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** New-format length, including partial body chunks */
function readNewFormat(
  data: Uint8Array,
  start: number,
): { body: Uint8Array; next: number } {
  const chunks: Uint8Array[] = [];
  let offset = start;

  for (;;) {
    need(data, offset, 1);
    const first = data[offset] ?? 0;
    let length: number;
    let partial = false;

    if (first < 192) {
      length = first;
      offset += 1;
    } else if (first < 224) {
      need(data, offset, 2);
      length = ((first - 192) << 8) + (data[offset + 1] ?? 0) + 192;
      offset += 2;
    } else if (first === 255) {
      length = readU32(data, offset + 1);
      offset += 5;
    } else {
      length = 1 << (first & 0x1f);
      partial = true;
      offset += 1;
    }

    need(data, offset, length);
    chunks.push(data.subarray(offset, offset + length));
    offset += length;

    if (!partial) {
      return { body: concat(chunks), next: offset };
    }
  }
}

/** Old-format length; type 3 means "until end of data" */
function readOldFormat(
  data: Uint8Array,
  start: number,
  lengthType: number,
): { body: Uint8Array; next: number } {
  let length: number;
  let offset = start;

  switch (lengthType) {
    case 0:
      need(data, offset, 1);
      length = data[offset] ?? 0;
      offset += 1;
      break;
    case 1:
      need(data, offset, 2);
      length = ((data[offset] ?? 0) << 8) | (data[offset + 1] ?? 0);
      offset += 2;
      break;
    case 2:
      length = readU32(data, offset);
      offset += 4;
      break;
    default:
      length = data.length - offset;
  }

  need(data, offset, length);
  return {
    body: data.subarray(offset, offset + length),
    next: offset + length,
  };
}

/**
 * Split a binary OpenPGP stream into packets
 *
 * @throws {PacketDecodeError} Invalid header octet or a length that runs
 * past the end of the data
 */
export function readPackets(data: Uint8Array): RawPacket[] {
  const packets: RawPacket[] = [];
  let offset = 0;

  while (offset < data.length) {
    const header = data[offset] ?? 0;
    if ((header & 0x80) === 0) {
      throw new PacketDecodeError("Invalid packet header", {
        offset,
        header,
      });
    }

    const newFormat = (header & 0x40) !== 0;
    const tag = newFormat ? header & 0x3f : (header >> 2) & 0x0f;
    const { body, next } = newFormat
      ? readNewFormat(data, offset + 1)
      : readOldFormat(data, offset + 1, header & 0x03);

    packets.push({ tag, body });
    offset = next;
  }

  return packets;
}
