/**
 * @fileoverview OpenPGP key metadata extraction.
 *
 * Parses a stream of OpenPGP packets into {@link KeyInfo} records:
 * fingerprint, algorithm, size, expiry, capabilities, user IDs, subkeys
 * and a synthesized validity. Signatures are not verified; this only
 * reads what the packets claim.
 *
 * @example
 * ```typescript
 * const [key] = await getKeyInfo(armoredPublicKey, {
 *   claim: { email: "alice@example.org", origin: "Autocrypt" },
 * });
 * summarizeKey(key); // "0123456789ABCDEF=alice@example.org/RSA2048/cs+e"
 * ```
 *
 * @module keyinfo
 */

import { decodePackets } from "~/packets";
import type { IdentityClaim, KeyInfo, PacketRecord } from "~/types";
import { unixNow } from "~/types";
import { errorMessage } from "~/utils/errors";
import type { KeyInfoLogger } from "~/utils/logger";
import { logger as defaultLogger } from "~/utils/logger";
import { assembleKeys } from "./assembler";
import { deriveKeys } from "./derivation";

export interface KeyInfoOptions {
  /** External identity assertion to merge into every key's UIDs */
  claim?: IdentityClaim;
  /** Reference time for expiry decisions, Unix seconds */
  now?: number;
  logger?: KeyInfoLogger;
}

export interface InspectionResult {
  /** False when the input is not an OpenPGP packet stream at all */
  parseable: boolean;
  keys: KeyInfo[];
}

/**
 * Assemble and derive keys from already decoded packet records
 *
 * Synchronous; only decoding (dearmoring) is asynchronous.
 */
export function interpretPackets(
  records: readonly PacketRecord[],
  options: KeyInfoOptions = {},
): KeyInfo[] {
  const now = options.now ?? unixNow();
  const keys = assembleKeys(records, { logger: options.logger });
  return deriveKeys(keys, { now, claim: options.claim });
}

/**
 * Decode and interpret key material, telling "not parseable" apart from
 * "parsed, no keys"
 */
export async function inspectKeyMaterial(
  data: string | Uint8Array,
  options: KeyInfoOptions = {},
): Promise<InspectionResult> {
  const logger = options.logger ?? defaultLogger;

  let records: PacketRecord[];
  try {
    records = await decodePackets(data);
  } catch (error) {
    logger.warn("Key material is not parseable", {
      error: errorMessage(error),
    });
    return { parseable: false, keys: [] };
  }

  return { parseable: true, keys: interpretPackets(records, options) };
}

/**
 * Parse OpenPGP key material into top-level keys
 *
 * Resolves to an empty list when the input cannot be decoded; never rejects.
 */
export async function getKeyInfo(
  data: string | Uint8Array,
  options: KeyInfoOptions = {},
): Promise<KeyInfo[]> {
  const { keys } = await inspectKeyMaterial(data, options);
  return keys;
}

export {
  assembleKeys,
  keysizeFromModulus,
  keysizeOf,
} from "./assembler";
export {
  addSubkeyCapabilities,
  baseCapabilities,
  deriveKeys,
  ensureIdentityClaim,
  synthesizeValidity,
} from "./derivation";
export {
  canEncrypt,
  canSign,
  describeKey,
  formatUid,
  isExpired,
  isUsable,
  summarizeKey,
} from "./presentation";
export type {
  DescribedKey,
  DescribedSubkey,
  DescribeOptions,
  SummaryOptions,
} from "./presentation";
export {
  applyKeyExpiration,
  applyKeyFlags,
  applySignature,
  capabilitiesFromFlags,
  mergeCapabilities,
} from "./signature";
