/**
 * Key metadata model produced by the packet-stream interpreter
 */

/**
 * Capability letters: `c` certify, `s` sign, `e` encrypt, `a` authenticate.
 * Stored on a key as a deduplicated string, optionally followed by
 * `+` and the letters inherited from live subkeys (e.g. `"cs+e"`).
 */
export type Capability = "c" | "s" | "e" | "a";

/**
 * Single-character validity code.
 *
 * `?` means not evaluated yet and `e` means expired. The remaining letters
 * follow GnuPG's listing codes and are reserved for trust evaluation,
 * which this package does not perform.
 */
export type KeyValidity =
  | ""
  | "?"
  | "e"
  | "r"
  | "d"
  | "i"
  | "n"
  | "m"
  | "f"
  | "u"
  | "-"
  | "q"
  | "o";

/** One identity claimed by a primary key */
export interface KeyUid {
  name: string;
  email: string;
  comment: string;
}

/** A primary key or subkey */
export interface KeyInfo {
  fingerprint: string;
  capabilities: string;
  /** Algorithm label, e.g. "RSA Encrypt or Sign" */
  keytypeName: string;
  /** Numeric algorithm identifier (RFC 9580 §9.1) */
  keytypeCode: number;
  /** Key size in bits */
  keysize: number;
  /** Unix seconds */
  created: number;
  /** Unix seconds, 0 = never expires */
  expires: number;
  validity: KeyValidity;
  /** Only populated on primary keys */
  uids: KeyUid[];
  /** Only populated on primary keys */
  subkeys: KeyInfo[];
  isSubkey: boolean;
  /** Set by callers that track a local keyring, never by the parser */
  onKeychain: boolean;
}

/**
 * External identity assertion reconciled against a key's UIDs,
 * typically the `addr` of an Autocrypt header.
 */
export interface IdentityClaim {
  email: string;
  /** Label recorded in UID comments, e.g. "Autocrypt" */
  origin: string;
}

/** Create a UID with defaults for missing fields */
export function createKeyUid(fields: Partial<KeyUid> = {}): KeyUid {
  return { name: "", email: "", comment: "", ...fields };
}

/** Create a key record with defaults for missing fields */
export function createKeyInfo(fields: Partial<KeyInfo> = {}): KeyInfo {
  return {
    fingerprint: "MISSING",
    capabilities: "",
    keytypeName: "unknown",
    keytypeCode: 0,
    keysize: 0,
    created: 0,
    expires: 0,
    validity: "?",
    uids: [],
    subkeys: [],
    isSubkey: false,
    onKeychain: false,
    ...fields,
  };
}
