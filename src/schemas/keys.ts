import { z } from "@hono/zod-openapi";
import { LIMITS } from "~/utils/constants";

/**
 * Capability string, e.g. "cs" or "cs+e"
 */
export const CapabilitiesSchema = z
  .string()
  .regex(/^[acse]*(\+[acse]+)?$/, "Capabilities must be letters from c, s, e, a")
  .openapi({ example: "cs+e" });

/**
 * Validity code; "?" unknown, "e" expired
 */
export const KeyValiditySchema = z
  .enum(["", "?", "e", "r", "d", "i", "n", "m", "f", "u", "-", "q", "o"])
  .openapi({ example: "?" });

/**
 * External identity claim
 */
export const IdentityClaimSchema = z
  .object({
    email: z.email("Claim email must be a valid address"),
    origin: z
      .string()
      .min(1)
      .max(LIMITS.MAX_ORIGIN_LENGTH)
      .regex(/^[^()]+$/, "Origin cannot contain parentheses")
      .optional(),
  })
  .openapi("IdentityClaim");

/** Unix seconds override for expiry decisions */
const NowSchema = z
  .number()
  .int()
  .nonnegative()
  .optional()
  .openapi({ example: 1700000000 });

/**
 * Key inspection request
 */
export const InspectKeyRequestSchema = z
  .object({
    keyData: z.string().min(1, "keyData cannot be empty").openapi({
      example: "-----BEGIN PGP PUBLIC KEY BLOCK-----\n...",
    }),
    encoding: z.enum(["armored", "base64"]).default("armored"),
    claim: IdentityClaimSchema.optional(),
    fullFingerprint: z.boolean().default(false),
    now: NowSchema,
  })
  .openapi("InspectKeyRequest");

/**
 * Autocrypt header inspection request
 */
export const InspectAutocryptRequestSchema = z
  .object({
    header: z.string().min(1).openapi({
      example: "addr=alice@example.org; prefer-encrypt=mutual; keydata=mQEN...",
    }),
    fullFingerprint: z.boolean().default(false),
    now: NowSchema,
  })
  .openapi("InspectAutocryptRequest");

const SubkeyFieldsSchema = z.object({
  fingerprint: z.string(),
  capabilities: CapabilitiesSchema,
  keytypeName: z.string(),
  keytypeCode: z.number().int(),
  keysize: z.number().int(),
  created: z.number().int(),
  expires: z.number().int(),
  validity: KeyValiditySchema,
  expired: z.boolean(),
  usable: z.boolean(),
  canEncrypt: z.boolean(),
  canSign: z.boolean(),
  summary: z.string(),
});

/**
 * Subkey description
 */
export const SubkeySchema = SubkeyFieldsSchema.openapi("Subkey");

/**
 * User ID description
 */
export const KeyUidSchema = z
  .object({
    name: z.string(),
    email: z.string(),
    comment: z.string(),
    display: z.string(),
  })
  .openapi("KeyUid");

/**
 * Primary key description
 */
export const KeySchema = SubkeyFieldsSchema.extend({
  onKeychain: z.boolean(),
  uids: z.array(KeyUidSchema),
  subkeys: z.array(SubkeySchema),
}).openapi("Key");

/**
 * Inspection response
 */
export const InspectKeyResponseSchema = z
  .object({
    parseable: z.boolean(),
    keys: z.array(KeySchema),
  })
  .openapi("InspectKeyResponse");

export type InspectKeyRequest = z.infer<typeof InspectKeyRequestSchema>;
export type InspectKeyResponse = z.infer<typeof InspectKeyResponseSchema>;
