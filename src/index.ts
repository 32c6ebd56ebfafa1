/**
 * Package entry: the key metadata API plus the HTTP application factory.
 */

export * from "~/keyinfo";
export { decodeBinary, decodePackets } from "~/packets";
export type {
  Capability,
  IdentityClaim,
  KeyInfo,
  KeyUid,
  KeyValidity,
  PacketRecord,
} from "~/types";
export { createKeyInfo, createKeyUid } from "~/types";
export {
  claimFromAutocrypt,
  parseAutocryptHeader,
} from "~/utils/autocrypt";
export type { AutocryptHeader } from "~/utils/autocrypt";
export { createApp } from "./app";
export type { App } from "./app";
