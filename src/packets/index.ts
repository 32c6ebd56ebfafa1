/**
 * @fileoverview OpenPGP packet decoder.
 *
 * Turns armored or binary key material into typed packet records. Framing
 * failures abort the whole decode with {@link PacketDecodeError}; a body
 * that cannot be viewed becomes a `malformed` record so one bad packet
 * never hides the rest of the stream.
 *
 * @module packets
 */

import type { PacketRecord, RawPacket } from "~/types";
import { errorMessage } from "~/utils/errors";
import { dearmor, isArmored } from "./armor";
import { PACKET_TAG } from "./constants";
import { parsePublicKey } from "./public-key";
import { readPackets } from "./reader";
import { parseSignature } from "./signature";
import { parseUserId } from "./user-id";

const latin1 = new TextDecoder("latin1");

/** Typed view of one framed packet; never throws */
export function viewPacket(packet: RawPacket): PacketRecord {
  try {
    switch (packet.tag) {
      case PACKET_TAG.PUBLIC_KEY:
      case PACKET_TAG.PUBLIC_SUBKEY:
      case PACKET_TAG.SECRET_KEY:
      case PACKET_TAG.SECRET_SUBKEY:
        return parsePublicKey(packet);
      case PACKET_TAG.USER_ID:
        return parseUserId(packet);
      case PACKET_TAG.SIGNATURE:
        return parseSignature(packet);
      default:
        return { kind: "other", tag: packet.tag };
    }
  } catch (error) {
    return { kind: "malformed", tag: packet.tag, reason: errorMessage(error) };
  }
}

/** Raw bytes of the input, dearmoring when it is armored text */
export async function toBinary(input: string | Uint8Array): Promise<Uint8Array> {
  if (typeof input === "string") {
    return isArmored(input)
      ? dearmor(input)
      : Uint8Array.from(input, (char) => char.charCodeAt(0) & 0xff);
  }
  // Armored text handed over as bytes
  const head = latin1.decode(input.subarray(0, 4096));
  return isArmored(head) ? dearmor(latin1.decode(input)) : input;
}

/**
 * Decode an unarmored packet stream into packet records
 *
 * @throws {PacketDecodeError} Broken packet framing
 */
export function decodeBinary(bytes: Uint8Array): PacketRecord[] {
  return readPackets(bytes).map(viewPacket);
}

/**
 * Decode key material, armored or binary, into packet records
 *
 * @throws {PacketDecodeError} The input is not an OpenPGP packet stream
 */
export async function decodePackets(
  input: string | Uint8Array,
): Promise<PacketRecord[]> {
  return decodeBinary(await toBinary(input));
}

export { dearmor, findArmorBlocks, isArmored } from "./armor";
export { readPackets } from "./reader";
