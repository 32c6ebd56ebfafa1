/**
 * Application configuration constants
 * These may be adjusted based on deployment requirements
 *
 * For immutable protocol-level constants, see:
 * - ~/types/time (TIME)
 * - ~/types/http (HTTP, HEADERS)
 * - ~/packets/constants (PACKET_TAG, SUBPACKET, KEY_FLAG)
 */

// =============================================================================
// Validation Limits (Configurable business constraints)
// =============================================================================

/**
 * Size limits for validation
 */
export const LIMITS = {
  /** Default maximum request body for key inspection, in bytes */
  MAX_KEY_DATA_BYTES: 1024 * 1024, // Keyrings with many certifications get large

  /** Maximum length of an identity-claim origin label */
  MAX_ORIGIN_LENGTH: 64,
} as const;

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULTS = {
  /** Origin label for claims taken from an Autocrypt header */
  AUTOCRYPT_ORIGIN: "Autocrypt",

  /** Port the Node.js server listens on */
  PORT: 8787,

  /** Interface the Node.js server binds to */
  HOST: "0.0.0.0",
} as const;

/** Reported by the health endpoint and the OpenAPI document */
export const SERVICE_VERSION = "1.0.0";
