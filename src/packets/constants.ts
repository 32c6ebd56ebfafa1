/**
 * OpenPGP protocol numbers the interpreter looks at
 *
 * Values come from openpgp.js's enum tables so the names line up with the
 * rest of the ecosystem.
 *
 * @link https://www.rfc-editor.org/rfc/rfc9580#section-5
 */

import { enums } from "openpgp";

/** Packet tags (RFC 9580 §5) */
export const PACKET_TAG = {
  SIGNATURE: enums.packet.signature,
  SECRET_KEY: enums.packet.secretKey,
  PUBLIC_KEY: enums.packet.publicKey,
  SECRET_SUBKEY: enums.packet.secretSubkey,
  USER_ID: enums.packet.userID,
  PUBLIC_SUBKEY: enums.packet.publicSubkey,
} as const;

/** Signature subpacket types (RFC 9580 §5.2.3.7) */
export const SUBPACKET = {
  SIGNATURE_CREATION_TIME: 2,
  KEY_EXPIRATION_TIME: 9,
  KEY_FLAGS: 27,
} as const;

/** Key flag bits (RFC 9580 §5.2.3.29) */
export const KEY_FLAG = {
  CERTIFY: enums.keyFlags.certifyKeys,
  SIGN: enums.keyFlags.signData,
  ENCRYPT_COMMUNICATION: enums.keyFlags.encryptCommunication,
  ENCRYPT_STORAGE: enums.keyFlags.encryptStorage,
  AUTHENTICATE: enums.keyFlags.authentication,
} as const;

/** Public-key algorithm identifiers (RFC 9580 §9.1) */
export const ALGORITHM = {
  RSA_ENCRYPT_SIGN: 1,
  RSA_ENCRYPT: 2,
  RSA_SIGN: 3,
  ELGAMAL_ENCRYPT: 16,
  DSA: 17,
  ECDH: 18,
  ECDSA: 19,
  ELGAMAL_ENCRYPT_SIGN: 20,
  EDDSA_LEGACY: 22,
  X25519: 25,
  X448: 26,
  ED25519: 27,
  ED448: 28,
} as const;

/**
 * Algorithm labels
 *
 * @link https://www.rfc-editor.org/rfc/rfc9580#section-9.1
 */
export const ALGORITHM_NAMES: Readonly<Record<number, string>> = {
  [ALGORITHM.RSA_ENCRYPT_SIGN]: "RSA Encrypt or Sign",
  [ALGORITHM.RSA_ENCRYPT]: "RSA Encrypt-Only",
  [ALGORITHM.RSA_SIGN]: "RSA Sign-Only",
  [ALGORITHM.ELGAMAL_ENCRYPT]: "ElGamal Encrypt-Only",
  [ALGORITHM.DSA]: "DSA Digital Signature Algorithm",
  [ALGORITHM.ECDH]: "ECDH public key algorithm",
  [ALGORITHM.ECDSA]: "ECDSA public key algorithm",
  [ALGORITHM.ELGAMAL_ENCRYPT_SIGN]: "Formerly ElGamal Encrypt or Sign",
  [ALGORITHM.EDDSA_LEGACY]: "EdDSA",
  [ALGORITHM.X25519]: "X25519",
  [ALGORITHM.X448]: "X448",
  [ALGORITHM.ED25519]: "Ed25519",
  [ALGORITHM.ED448]: "Ed448",
};

/** Field size in bits for the curves OpenPGP names by OID */
export const CURVE_BITS: Readonly<Record<string, number>> = {
  "1.2.840.10045.3.1.7": 256, // NIST P-256
  "1.3.132.0.34": 384, // NIST P-384
  "1.3.132.0.35": 521, // NIST P-521
  "1.3.132.0.10": 256, // secp256k1
  "1.3.36.3.3.2.8.1.1.7": 256, // brainpoolP256r1
  "1.3.36.3.3.2.8.1.1.11": 384, // brainpoolP384r1
  "1.3.36.3.3.2.8.1.1.13": 512, // brainpoolP512r1
  "1.3.6.1.4.1.11591.15.1": 256, // Ed25519 (legacy)
  "1.3.6.1.4.1.3029.1.5.1": 256, // Curve25519 (legacy)
  "1.3.101.110": 256, // X25519
  "1.3.101.111": 448, // X448
  "1.3.101.112": 256, // Ed25519
  "1.3.101.113": 448, // Ed448
};

/** Native key sizes for algorithms without an OID or MPI */
export const FIXED_KEY_BITS: Readonly<Record<number, number>> = {
  [ALGORITHM.X25519]: 256,
  [ALGORITHM.X448]: 448,
  [ALGORITHM.ED25519]: 256,
  [ALGORITHM.ED448]: 448,
};
