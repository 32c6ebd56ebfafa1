/**
 * Read-only projections of the key model
 */

import type { KeyInfo, KeyUid, KeyValidity } from "~/types";
import { unixNow } from "~/types";

/** Expiry is set and has passed */
export function isExpired(key: KeyInfo, now: number = unixNow()): boolean {
  return key.expires > 0 && now > key.expires;
}

/** No adverse validity code and not expired */
export function isUsable(key: KeyInfo, now: number = unixNow()): boolean {
  return (key.validity === "" || key.validity === "?") && !isExpired(key, now);
}

export function canEncrypt(key: KeyInfo, now: number = unixNow()): boolean {
  return key.capabilities.includes("e") && isUsable(key, now);
}

export function canSign(key: KeyInfo, now: number = unixNow()): boolean {
  return key.capabilities.includes("s") && isUsable(key, now);
}

export interface SummaryOptions {
  fullFingerprint?: boolean;
  now?: number;
}

/**
 * One-line summary: key ID, emails, expiry, algorithm, size, capabilities
 *
 * @example "0123456789ABCDEF=a@example.com/RSA2048/cs+e"
 *
 * A trailing `!` marks an unusable key.
 */
export function summarizeKey(
  key: KeyInfo,
  { fullFingerprint = false, now = unixNow() }: SummaryOptions = {},
): string {
  const fingerprint = fullFingerprint
    ? key.fingerprint
    : key.fingerprint.slice(-16);
  const emails = key.uids
    .map((uid) => uid.email)
    .filter((email) => email.length > 0)
    .join(",");

  return [
    fingerprint,
    emails ? `=${emails}` : "",
    key.expires ? `<${key.expires.toString(16)}` : "",
    "/",
    key.keytypeName.slice(0, 3),
    String(key.keysize),
    "/",
    key.capabilities,
    isUsable(key, now) ? "" : "!",
  ].join("");
}

/** `Name <email> (comment)`, leaving out empty parts */
export function formatUid(uid: KeyUid): string {
  const parts: string[] = [];
  if (uid.name) parts.push(uid.name);
  if (uid.email) parts.push(`<${uid.email}>`);
  if (uid.comment) parts.push(`(${uid.comment})`);
  return parts.join(" ");
}

/** Subkey with its derived flags */
export interface DescribedSubkey {
  fingerprint: string;
  capabilities: string;
  keytypeName: string;
  keytypeCode: number;
  keysize: number;
  created: number;
  expires: number;
  validity: KeyValidity;
  expired: boolean;
  usable: boolean;
  canEncrypt: boolean;
  canSign: boolean;
  summary: string;
}

/** Primary key with derived flags, formatted UIDs and subkeys */
export interface DescribedKey extends DescribedSubkey {
  onKeychain: boolean;
  uids: Array<KeyUid & { display: string }>;
  subkeys: DescribedSubkey[];
}

export interface DescribeOptions {
  fullFingerprint?: boolean;
  now?: number;
}

function describeSubkey(
  key: KeyInfo,
  { fullFingerprint = false, now = unixNow() }: DescribeOptions,
): DescribedSubkey {
  return {
    fingerprint: key.fingerprint,
    capabilities: key.capabilities,
    keytypeName: key.keytypeName,
    keytypeCode: key.keytypeCode,
    keysize: key.keysize,
    created: key.created,
    expires: key.expires,
    validity: key.validity,
    expired: isExpired(key, now),
    usable: isUsable(key, now),
    canEncrypt: canEncrypt(key, now),
    canSign: canSign(key, now),
    summary: summarizeKey(key, { fullFingerprint, now }),
  };
}

/** JSON-ready view of a primary key */
export function describeKey(
  key: KeyInfo,
  options: DescribeOptions = {},
): DescribedKey {
  const resolved = { ...options, now: options.now ?? unixNow() };
  return {
    ...describeSubkey(key, resolved),
    onKeychain: key.onKeychain,
    uids: key.uids.map((uid) => ({ ...uid, display: formatUid(uid) })),
    subkeys: key.subkeys.map((subkey) => describeSubkey(subkey, resolved)),
  };
}
