/**
 * Branded types for security-critical strings
 */

/**
 * Brand type for nominal typing - creates distinct types from string
 */
declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** OpenPGP key fingerprint
 * @example "0123456789ABCDEF0123456789ABCDEF01234567"
 *
 * 32 hex chars for v3 keys, 40 for v4, 64 for v5/v6.
 */
export type KeyFingerprint = Brand<string, "KeyFingerprint">;

/** Normalized (trimmed, lowercased) email address used for UID matching */
export type NormalizedEmail = Brand<string, "NormalizedEmail">;

/** Helper function to create validated key fingerprint */
export function createKeyFingerprint(value: string): KeyFingerprint {
  if (!/^(?:[A-F0-9]{32}|[A-F0-9]{40}|[A-F0-9]{64})$/i.test(value)) {
    throw new Error(`Invalid KeyFingerprint format: ${value}`);
  }
  return value.toUpperCase() as KeyFingerprint;
}

/** Helper function to normalize an email for comparison */
export function normalizeEmail(value: string): NormalizedEmail {
  return value.trim().toLowerCase() as NormalizedEmail;
}
