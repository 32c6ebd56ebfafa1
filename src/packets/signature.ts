/**
 * @fileoverview Signature packet view (RFC 9580 §5.2).
 *
 * Reads the fixed header and the subpacket areas. The signature value
 * itself is never looked at: nothing here verifies anything.
 *
 * @module packets/signature
 */

import type { RawPacket, SignatureRecord, Subpacket } from "~/types";
import { PacketFieldError } from "~/utils/errors";
import { ByteReader } from "./byte-reader";
import { SUBPACKET } from "./constants";

function subpacketLength(reader: ByteReader): number {
  const first = reader.u8("subpacket length");
  if (first < 192) return first;
  if (first < 255) {
    return ((first - 192) << 8) + reader.u8("subpacket length") + 192;
  }
  return reader.u32("subpacket length");
}

/** Parse a subpacket area into its entries, in order */
export function parseSubpackets(area: Uint8Array, tag: number): Subpacket[] {
  const reader = new ByteReader(area, tag);
  const subpackets: Subpacket[] = [];

  while (reader.remaining > 0) {
    const length = subpacketLength(reader);
    if (length === 0) {
      throw new PacketFieldError("Empty subpacket", tag);
    }
    const type = reader.u8("subpacket type");
    subpackets.push({
      type: type & 0x7f,
      critical: (type & 0x80) !== 0,
      data: reader.bytes(length - 1, "subpacket data"),
    });
  }

  return subpackets;
}

/** Big-endian unsigned 32-bit value from the first four octets */
export function readUint32(data: Uint8Array): number {
  return (
    (((data[0] ?? 0) << 24) | ((data[1] ?? 0) << 16) | ((data[2] ?? 0) << 8)
      | (data[3] ?? 0)) >>> 0
  );
}

/**
 * View a signature packet
 *
 * @throws {PacketFieldError} Unsupported version or truncated areas
 */
export function parseSignature(packet: RawPacket): SignatureRecord {
  const { tag, body } = packet;
  const reader = new ByteReader(body, tag);
  const version = reader.u8("version");

  if (version === 2 || version === 3) {
    reader.u8("hashed length");
    const signatureType = reader.u8("signature type");
    const created = reader.u32("creation time");
    return {
      kind: "signature",
      tag,
      version,
      signatureType,
      created,
      subpackets: [],
    };
  }

  if (version !== 4 && version !== 5 && version !== 6) {
    throw new PacketFieldError("Unsupported signature version", tag, {
      version,
    });
  }

  const signatureType = reader.u8("signature type");
  reader.u8("public-key algorithm");
  reader.u8("hash algorithm");

  // v6 widened the subpacket area lengths to four octets
  const areaLength = (field: string) =>
    version === 6 ? reader.u32(field) : reader.u16(field);
  const hashed = reader.bytes(areaLength("hashed length"), "hashed area");
  const unhashed = reader.bytes(areaLength("unhashed length"), "unhashed area");

  const subpackets = [
    ...parseSubpackets(hashed, tag),
    ...parseSubpackets(unhashed, tag),
  ];
  const creation = subpackets.find(
    (s) => s.type === SUBPACKET.SIGNATURE_CREATION_TIME && s.data.length >= 4,
  );

  return {
    kind: "signature",
    tag,
    version,
    signatureType,
    created: creation ? readUint32(creation.data) : 0,
    subpackets,
  };
}
