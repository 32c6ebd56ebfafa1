/**
 * Post-assembly derivations. Every function takes the same `now` so the
 * flags computed for one call agree with each other.
 */

import type { IdentityClaim, KeyInfo } from "~/types";
import { createKeyUid, normalizeEmail } from "~/types";

/** Capabilities as they were before any subkey merge */
export function baseCapabilities(capabilities: string): string {
  return capabilities.split("+")[0] ?? "";
}

/** Mark a key expired when its expiry has passed and no validity is set */
export function synthesizeValidity(key: KeyInfo, now: number): void {
  if (
    key.expires > 0
    && key.expires < now
    && (key.validity === "" || key.validity === "?")
  ) {
    key.validity = "e";
  }
}

/**
 * Let a key inherit the capabilities of its unexpired subkeys
 *
 * The result is `<own>+<inherited>`; the own segment is always taken
 * from before the first `+`, so running this twice changes nothing.
 */
export function addSubkeyCapabilities(key: KeyInfo, now: number): void {
  const inherited = new Set<string>();
  for (const subkey of key.subkeys) {
    if (subkey.expires > 0 && subkey.expires < now) continue;
    for (const letter of baseCapabilities(subkey.capabilities)) {
      inherited.add(letter);
    }
  }
  if (inherited.size > 0) {
    key.capabilities = `${baseCapabilities(key.capabilities)}+${
      [...inherited].sort().join("")
    }`;
  }
}

/**
 * Reconcile an external identity claim with a primary key's UIDs
 *
 * UIDs with the claimed email get `(<origin>)` added to their comment once;
 * without any match a UID is synthesized from the claim.
 */
export function ensureIdentityClaim(key: KeyInfo, claim: IdentityClaim): void {
  if (key.isSubkey) return;

  const email = normalizeEmail(claim.email);
  const marker = `(${claim.origin})`;
  let found = false;

  for (const uid of key.uids) {
    if (normalizeEmail(uid.email) !== email) continue;
    found = true;
    if (uid.comment !== claim.origin && !uid.comment.includes(marker)) {
      uid.comment += marker;
    }
  }

  if (!found) {
    key.uids.push(createKeyUid({ email: claim.email, comment: claim.origin }));
  }
}

export interface DerivationOptions {
  /** Reference time, Unix seconds */
  now: number;
  claim?: IdentityClaim;
}

/** Run every derivation over the top-level keys */
export function deriveKeys(
  keys: KeyInfo[],
  { now, claim }: DerivationOptions,
): KeyInfo[] {
  for (const key of keys) {
    synthesizeValidity(key, now);
    addSubkeyCapabilities(key, now);
    if (claim) {
      ensureIdentityClaim(key, claim);
    }
  }
  return keys;
}
