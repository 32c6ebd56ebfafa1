/**
 * @fileoverview ASCII armor decoding (RFC 9580 §6).
 *
 * Each block is handed to openpgp.js `unarmor`; this module only finds the
 * blocks in surrounding text and joins their payloads. Checksum handling is
 * openpgp.js's.
 *
 * @module packets/armor
 */

import { concatBytes } from "@noble/hashes/utils";
import { unarmor } from "openpgp";
import { errorMessage, PacketDecodeError } from "~/utils/errors";

const BLOCK_PATTERN =
  /-----BEGIN PGP ([A-Z0-9 ,/]+)-----\r?\n[\s\S]*?-----END PGP \1-----/g;

/** True when the input carries an armor header line */
export function isArmored(text: string): boolean {
  return text.includes("-----BEGIN");
}

/** Complete armor blocks in the text, in order, with their surroundings cut */
export function findArmorBlocks(text: string): string[] {
  return Array.from(text.matchAll(BLOCK_PATTERN), (match) => match[0]);
}

async function readAll(data: unknown): Promise<Uint8Array> {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (!(data instanceof ReadableStream)) {
    throw new PacketDecodeError("Unexpected armor payload");
  }

  const chunks: Uint8Array[] = [];
  const reader = data.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!(value instanceof Uint8Array)) {
      throw new PacketDecodeError("Unexpected armor payload");
    }
    chunks.push(value);
  }
  return concatBytes(...chunks);
}

async function decodeBlock(block: string, index: number): Promise<Uint8Array> {
  try {
    const { data } = await unarmor(block);
    return await readAll(data);
  } catch (error) {
    if (error instanceof PacketDecodeError) throw error;
    throw new PacketDecodeError("Armor block could not be decoded", {
      block: index,
      reason: errorMessage(error),
    });
  }
}

/**
 * Decode armored text into one binary packet stream
 *
 * Multiple blocks (e.g. a keyring export pasted together) are concatenated.
 *
 * @throws {PacketDecodeError} No complete block, or a block openpgp.js rejects
 */
export async function dearmor(text: string): Promise<Uint8Array> {
  const blocks = findArmorBlocks(text);
  if (blocks.length === 0) {
    throw new PacketDecodeError("No complete armor block found");
  }

  const payloads: Uint8Array[] = [];
  for (const [index, block] of blocks.entries()) {
    payloads.push(await decodeBlock(block, index));
  }
  return concatBytes(...payloads);
}
