/**
 * @fileoverview Stream assembler.
 *
 * One forward pass over decoded packet records that builds the
 * key → (uids, subkeys) tree. Parser context is a local state value:
 *
 * - no key seen: user IDs and signatures are dropped
 * - primary current: signatures bind to the primary key
 * - subkey current: signatures bind to the subkey, user IDs still go to
 *   the owning primary
 * - unreadable key packet: nothing is current until the next key; after an
 *   unreadable primary, user IDs and subkeys are dropped too
 *
 * A failure on one record is logged and only that record's effect is lost.
 *
 * @module keyinfo/assembler
 */

import { bytesToHex } from "@noble/hashes/utils";
import {
  ALGORITHM_NAMES,
  CURVE_BITS,
  FIXED_KEY_BITS,
  PACKET_TAG,
} from "~/packets/constants";
import type { KeyInfo, PacketRecord, PublicKeyRecord } from "~/types";
import { createKeyInfo, createKeyUid, TIME } from "~/types";
import { errorMessage } from "~/utils/errors";
import type { KeyInfoLogger } from "~/utils/logger";
import { logger as defaultLogger } from "~/utils/logger";
import { applySignature } from "./signature";

const PRIMARY_TAGS: ReadonlySet<number> = new Set([
  PACKET_TAG.PUBLIC_KEY,
  PACKET_TAG.SECRET_KEY,
]);
const KEY_TAGS: ReadonlySet<number> = new Set([
  ...PRIMARY_TAGS,
  PACKET_TAG.PUBLIC_SUBKEY,
  PACKET_TAG.SECRET_SUBKEY,
]);

export interface AssemblerOptions {
  logger?: KeyInfoLogger;
}

interface AssemblyState {
  keys: KeyInfo[];
  primary?: KeyInfo;
  current?: KeyInfo;
}

/**
 * Key size from the size-defining MPI
 *
 * Reproduces the long-standing approximation `1.024 × round(hexDigits /
 * 0.256)` in integer arithmetic so existing summaries stay comparable
 * (2048-bit RSA → 2048).
 */
export function keysizeFromModulus(modulus: Uint8Array): number {
  const hex = bytesToHex(modulus).replace(/^0+/, "") || "0";
  const units = Math.round((hex.length * 125) / 32);
  return Math.floor((units * 1024) / 1000);
}

/** Key size for any algorithm: MPI, then curve, then native size */
export function keysizeOf(record: PublicKeyRecord): number {
  if (record.modulus) return keysizeFromModulus(record.modulus);
  if (record.curveOid) return CURVE_BITS[record.curveOid] ?? 0;
  return FIXED_KEY_BITS[record.algorithm] ?? 0;
}

function onPublicKey(
  state: AssemblyState,
  record: PublicKeyRecord,
  logger: KeyInfoLogger,
): void {
  const key = createKeyInfo({
    fingerprint: record.fingerprint,
    keytypeName: ALGORITHM_NAMES[record.algorithm] ?? "unknown",
    keytypeCode: record.algorithm,
    keysize: keysizeOf(record),
  });

  if (record.subkey) {
    if (!state.primary) {
      logger.warn("Subkey packet before any primary key, skipped", {
        fingerprint: record.fingerprint,
      });
      return;
    }
    key.isSubkey = true;
    state.primary.subkeys.push(key);
  } else {
    state.keys.push(key);
    state.primary = key;
  }
  state.current = key;

  key.created = record.created;
  if (record.daysValid > 0) {
    key.expires = record.created + record.daysValid * TIME.DAY;
    if (key.expires === key.created) {
      key.expires = 0;
    }
  }
}

function step(
  state: AssemblyState,
  record: PacketRecord,
  logger: KeyInfoLogger,
): void {
  switch (record.kind) {
    case "publicKey":
      onPublicKey(state, record, logger);
      return;
    case "userId":
      state.primary?.uids.push(
        createKeyUid({
          name: record.name,
          email: record.email,
          comment: record.comment,
        }),
      );
      return;
    case "signature":
      if (state.current) {
        applySignature(state.current, record);
      }
      return;
    case "malformed":
      logger.warn("Malformed packet skipped", {
        tag: record.tag,
        reason: record.reason,
      });
      if (KEY_TAGS.has(record.tag)) {
        // Packets that follow belong to the unreadable key, not the last good one
        state.current = undefined;
        if (PRIMARY_TAGS.has(record.tag)) {
          state.primary = undefined;
        }
      }
      return;
    case "other":
      return;
  }
}

/**
 * Build the top-level key list from packet records, in stream order
 *
 * Never throws; subkeys are only reachable through their primary.
 */
export function assembleKeys(
  records: readonly PacketRecord[],
  options: AssemblerOptions = {},
): KeyInfo[] {
  const logger = options.logger ?? defaultLogger;
  const state: AssemblyState = { keys: [] };

  records.forEach((record, index) => {
    try {
      step(state, record, logger);
    } catch (error) {
      logger.warn("Packet skipped", {
        index,
        tag: record.tag,
        error: errorMessage(error),
      });
    }
  });

  return state.keys;
}
