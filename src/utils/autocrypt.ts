/**
 * @fileoverview Autocrypt header parsing.
 *
 * The identity claim reconciled against a key's UIDs usually arrives in an
 * `Autocrypt:` mail header next to the key itself.
 *
 * @see {@link https://autocrypt.org/level1.html#the-autocrypt-header}
 *
 * @module utils/autocrypt
 */

import type { IdentityClaim } from "~/types";
import { HTTP } from "~/types";
import { DEFAULTS } from "./constants";
import { AppError } from "./errors";

export type PreferEncrypt = "mutual" | "nopreference";

export interface AutocryptHeader {
  addr: string;
  preferEncrypt: PreferEncrypt;
  keydata: Uint8Array;
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function invalid(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(
    message,
    "INVALID_AUTOCRYPT_HEADER",
    HTTP.BadRequest,
    context,
  );
}

/**
 * Parse the value of an Autocrypt header
 *
 * `addr` and `keydata` are required. Unknown attributes starting with `_`
 * are ignored; any other unknown attribute makes the header invalid.
 *
 * @throws {AppError} INVALID_AUTOCRYPT_HEADER
 */
export function parseAutocryptHeader(value: string): AutocryptHeader {
  const attributes = new Map<string, string>();

  for (const part of value.split(";")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const separator = trimmed.indexOf("=");
    if (separator <= 0) {
      throw invalid("Malformed Autocrypt attribute", { attribute: trimmed });
    }
    const name = trimmed.slice(0, separator).trim().toLowerCase();
    if (attributes.has(name)) {
      throw invalid("Duplicate Autocrypt attribute", { attribute: name });
    }
    attributes.set(name, trimmed.slice(separator + 1).trim());
  }

  for (const name of attributes.keys()) {
    if (!["addr", "prefer-encrypt", "keydata"].includes(name)
      && !name.startsWith("_")) {
      throw invalid("Unknown critical Autocrypt attribute", {
        attribute: name,
      });
    }
  }

  const addr = attributes.get("addr");
  if (!addr) {
    throw invalid("Autocrypt header has no addr");
  }

  const keydata = (attributes.get("keydata") ?? "").replace(/\s+/g, "");
  if (!keydata || !BASE64.test(keydata)) {
    throw invalid("Autocrypt header has no usable keydata");
  }

  return {
    addr,
    preferEncrypt: attributes.get("prefer-encrypt") === "mutual"
      ? "mutual"
      : "nopreference",
    keydata: new Uint8Array(Buffer.from(keydata, "base64")),
  };
}

/** Identity claim carried by an Autocrypt header */
export function claimFromAutocrypt(
  header: AutocryptHeader,
  origin: string = DEFAULTS.AUTOCRYPT_ORIGIN,
): IdentityClaim {
  return { email: header.addr, origin };
}
