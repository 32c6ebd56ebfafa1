/**
 * @fileoverview Public-key and secret-key packet view (RFC 9580 §5.5).
 *
 * Only the public part of a secret key packet is read. Key material that
 * cannot be parsed (unknown algorithm, truncated MPI) leaves `modulus` and
 * `curveOid` unset instead of failing the packet.
 *
 * @module packets/public-key
 */

import { bytesToHex } from "@noble/hashes/utils";
import { md5, sha1 } from "@noble/hashes/legacy";
import { sha256 } from "@noble/hashes/sha2";
import type { PublicKeyRecord, RawPacket } from "~/types";
import { createKeyFingerprint } from "~/types";
import { PacketFieldError } from "~/utils/errors";
import { ByteReader } from "./byte-reader";
import { ALGORITHM, FIXED_KEY_BITS, PACKET_TAG } from "./constants";

interface KeyMaterial {
  modulus?: Uint8Array;
  curveOid?: string;
  /** RSA public exponent, needed for v3 fingerprints */
  exponent?: Uint8Array;
}

/** Decode a DER object identifier body into dotted form */
export function oidToString(der: Uint8Array): string {
  if (der.length === 0) return "";
  const first = der[0] ?? 0;
  const arcs = [Math.floor(first / 40), first % 40];
  let value = 0;
  for (const byte of der.subarray(1)) {
    value = value * 128 + (byte & 0x7f);
    if ((byte & 0x80) === 0) {
      arcs.push(value);
      value = 0;
    }
  }
  return arcs.join(".");
}

function readOid(reader: ByteReader): string {
  const length = reader.u8("curve OID length");
  if (length === 0 || length === 0xff) {
    throw new PacketFieldError("Reserved curve OID length", reader.tag);
  }
  return oidToString(reader.bytes(length, "curve OID"));
}

/** Parse algorithm-specific public fields, leaving the reader after them */
function readMaterial(reader: ByteReader, algorithm: number): KeyMaterial {
  switch (algorithm) {
    case ALGORITHM.RSA_ENCRYPT_SIGN:
    case ALGORITHM.RSA_ENCRYPT:
    case ALGORITHM.RSA_SIGN: {
      const modulus = reader.mpi("RSA n");
      const exponent = reader.mpi("RSA e");
      return { modulus, exponent };
    }
    case ALGORITHM.DSA: {
      const modulus = reader.mpi("DSA p");
      reader.mpi("DSA q");
      reader.mpi("DSA g");
      reader.mpi("DSA y");
      return { modulus };
    }
    case ALGORITHM.ELGAMAL_ENCRYPT:
    case ALGORITHM.ELGAMAL_ENCRYPT_SIGN: {
      const modulus = reader.mpi("Elgamal p");
      reader.mpi("Elgamal g");
      reader.mpi("Elgamal y");
      return { modulus };
    }
    case ALGORITHM.ECDSA:
    case ALGORITHM.EDDSA_LEGACY: {
      const curveOid = readOid(reader);
      reader.mpi("EC point");
      return { curveOid };
    }
    case ALGORITHM.ECDH: {
      const curveOid = readOid(reader);
      reader.mpi("EC point");
      reader.bytes(reader.u8("KDF length"), "KDF parameters");
      return { curveOid };
    }
    default: {
      const bits = FIXED_KEY_BITS[algorithm];
      if (bits === undefined) {
        throw new PacketFieldError("Unknown public-key algorithm", reader.tag, {
          algorithm,
        });
      }
      // X25519/X448/Ed25519 store the raw key; Ed448 adds one prefix octet
      const length = algorithm === ALGORITHM.ED448 ? 57 : Math.ceil(bits / 8);
      reader.bytes(length, "native public key");
      return {};
    }
  }
}

function prefixed(prefix: number, lengthOctets: 2 | 4, body: Uint8Array) {
  const out = new Uint8Array(1 + lengthOctets + body.length);
  out[0] = prefix;
  for (let i = 0; i < lengthOctets; i++) {
    out[lengthOctets - i] = (body.length >>> (8 * i)) & 0xff;
  }
  out.set(body, 1 + lengthOctets);
  return out;
}

/**
 * Compute the fingerprint for a key version
 *
 * @link https://www.rfc-editor.org/rfc/rfc9580#section-5.5.4
 */
export function computeFingerprint(
  version: number,
  publicBody: Uint8Array,
  material: KeyMaterial,
  tag: number,
): string {
  switch (version) {
    case 2:
    case 3: {
      if (!material.modulus || !material.exponent) {
        throw new PacketFieldError("v3 fingerprint requires RSA material", tag);
      }
      const joined = new Uint8Array(
        material.modulus.length + material.exponent.length,
      );
      joined.set(material.modulus, 0);
      joined.set(material.exponent, material.modulus.length);
      return bytesToHex(md5(joined));
    }
    case 4:
      return bytesToHex(sha1(prefixed(0x99, 2, publicBody)));
    case 5:
      return bytesToHex(sha256(prefixed(0x9a, 4, publicBody)));
    case 6:
      return bytesToHex(sha256(prefixed(0x9b, 4, publicBody)));
    default:
      throw new PacketFieldError("Unsupported key version", tag, { version });
  }
}

/**
 * View a key packet
 *
 * @throws {PacketFieldError} Unsupported version or truncated fixed header
 */
export function parsePublicKey(packet: RawPacket): PublicKeyRecord {
  const { tag, body } = packet;
  const reader = new ByteReader(body, tag);

  const version = reader.u8("version");
  const created = reader.u32("creation time");
  let daysValid = 0;
  let materialLength: number | undefined;

  if (version === 2 || version === 3) {
    daysValid = reader.u16("validity days");
  }
  const algorithm = reader.u8("algorithm");
  if (version === 5 || version === 6) {
    materialLength = reader.u32("key material length");
  } else if (version !== 2 && version !== 3 && version !== 4) {
    throw new PacketFieldError("Unsupported key version", tag, { version });
  }

  const materialStart = reader.position;
  let material: KeyMaterial = {};
  let publicEnd: number;
  try {
    material = readMaterial(reader, algorithm);
    publicEnd = reader.position;
  } catch (error) {
    if (!(error instanceof PacketFieldError)) throw error;
    // Unparseable material: the whole body is taken as public unless the
    // stated length says otherwise
    publicEnd = body.length;
  }
  if (materialLength !== undefined) {
    publicEnd = Math.min(body.length, materialStart + materialLength);
  }

  const fingerprint = computeFingerprint(
    version,
    body.subarray(0, publicEnd),
    material,
    tag,
  );

  return {
    kind: "publicKey",
    tag,
    subkey: tag === PACKET_TAG.PUBLIC_SUBKEY || tag === PACKET_TAG.SECRET_SUBKEY,
    secret: tag === PACKET_TAG.SECRET_KEY || tag === PACKET_TAG.SECRET_SUBKEY,
    version,
    fingerprint: createKeyFingerprint(fingerprint),
    algorithm,
    created,
    daysValid,
    ...(material.modulus && { modulus: material.modulus }),
    ...(material.curveOid && { curveOid: material.curveOid }),
  };
}
