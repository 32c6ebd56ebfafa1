/**
 * Folds key-expiration and key-flags subpackets into the key a signature
 * currently binds to.
 */

import { KEY_FLAG, SUBPACKET } from "~/packets/constants";
import { readUint32 } from "~/packets/signature";
import type { Capability, KeyInfo, SignatureRecord } from "~/types";
import { PacketFieldError } from "~/utils/errors";

/** Key-flag bits and the letter each one grants */
const FLAG_LETTERS: ReadonlyArray<readonly [number, Capability]> = [
  [KEY_FLAG.CERTIFY, "c"],
  [KEY_FLAG.SIGN, "s"],
  [KEY_FLAG.ENCRYPT_COMMUNICATION | KEY_FLAG.ENCRYPT_STORAGE, "e"],
  [KEY_FLAG.AUTHENTICATE, "a"],
];

/** Capability letters granted by the first key-flags octet */
export function capabilitiesFromFlags(flags: number): Capability[] {
  return FLAG_LETTERS.filter(([bit]) => (flags & bit) !== 0).map(
    ([, letter]) => letter,
  );
}

/** Union of capability letters, sorted and deduplicated */
export function mergeCapabilities(
  existing: string,
  added: Iterable<string>,
): string {
  return [...new Set([...existing, ...added])].sort().join("");
}

/**
 * Apply a key-expiration duration (seconds after key creation)
 *
 * Expiry only ever tightens: the candidate is taken when the key has none
 * yet or when it is earlier than the current one. Zero means "no expiry"
 * on the wire and is never taken.
 */
export function applyKeyExpiration(key: KeyInfo, seconds: number): void {
  if (seconds <= 0) return;
  const candidate = key.created + seconds;
  if (candidate > 0 && (key.expires === 0 || candidate < key.expires)) {
    key.expires = candidate;
  }
}

/** Add the letters of a key-flags octet to the key */
export function applyKeyFlags(key: KeyInfo, flags: number): void {
  key.capabilities = mergeCapabilities(
    key.capabilities,
    capabilitiesFromFlags(flags),
  );
}

/**
 * Interpret one signature against the current key or subkey
 *
 * @throws {PacketFieldError} A relevant subpacket is too short
 */
export function applySignature(key: KeyInfo, signature: SignatureRecord): void {
  for (const subpacket of signature.subpackets) {
    switch (subpacket.type) {
      case SUBPACKET.KEY_EXPIRATION_TIME:
        if (subpacket.data.length < 4) {
          throw new PacketFieldError(
            "Short key expiration subpacket",
            signature.tag,
          );
        }
        applyKeyExpiration(key, readUint32(subpacket.data));
        break;
      case SUBPACKET.KEY_FLAGS: {
        const flags = subpacket.data[0];
        if (flags === undefined) {
          throw new PacketFieldError("Empty key flags subpacket", signature.tag);
        }
        applyKeyFlags(key, flags);
        break;
      }
    }
  }
}
