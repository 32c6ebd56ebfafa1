/**
 * Decoded OpenPGP packet records
 *
 * @link https://www.rfc-editor.org/rfc/rfc9580#section-5
 */

import type { KeyFingerprint } from "./branded";

/** Packet as framed on the wire, before any tag-specific parsing */
export interface RawPacket {
  tag: number;
  body: Uint8Array;
}

/** Public or secret (sub)key packet, tags 5, 6, 7 and 14 */
export interface PublicKeyRecord {
  kind: "publicKey";
  tag: number;
  subkey: boolean;
  secret: boolean;
  version: number;
  fingerprint: KeyFingerprint;
  algorithm: number;
  /** Raw creation time, Unix seconds */
  created: number;
  /** v2/v3 "valid for N days"; 0 for newer versions */
  daysValid: number;
  /** Size-defining MPI (RSA n, DSA/Elgamal p), absent when unparseable */
  modulus?: Uint8Array;
  /** Dotted curve OID for ECC algorithms */
  curveOid?: string;
}

/** User ID packet, tag 13 */
export interface UserIdRecord {
  kind: "userId";
  tag: number;
  text: string;
  name: string;
  email: string;
  comment: string;
}

/** Signature subpacket (RFC 9580 §5.2.3.7) */
export interface Subpacket {
  type: number;
  critical: boolean;
  data: Uint8Array;
}

/** Signature packet, tag 2 */
export interface SignatureRecord {
  kind: "signature";
  tag: number;
  version: number;
  signatureType: number;
  /** Unix seconds, 0 when the signature does not state one */
  created: number;
  /** Hashed subpackets first, then unhashed ones */
  subpackets: Subpacket[];
}

/** Any packet the interpreter does not look into */
export interface OtherRecord {
  kind: "other";
  tag: number;
}

/** Packet whose body could not be viewed */
export interface MalformedRecord {
  kind: "malformed";
  tag: number;
  reason: string;
}

export type PacketRecord =
  | PublicKeyRecord
  | UserIdRecord
  | SignatureRecord
  | OtherRecord
  | MalformedRecord;
