/**
 * Central types module - re-exports all type definitions
 *
 * Types are organized into logical sub-modules:
 * - branded: Security-critical branded string types
 * - env: Hono environment and context
 * - http: HTTP status codes and header names
 * - key-info: Key metadata model
 * - packets: Decoded OpenPGP packet records
 * - time: Time conversion constants
 */

// Branded types
export * from "./branded";
// Environment & context
export type * from "./env";
// HTTP status codes and header names
export { HEADERS, HTTP } from "./http";
// Key metadata
export * from "./key-info";
// Packet records
export type * from "./packets";
// Time constants
export { TIME, unixNow } from "./time";
