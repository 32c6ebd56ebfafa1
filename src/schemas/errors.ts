import { z } from "@hono/zod-openapi";

/**
 * All valid error codes used in the codebase
 */
export const ErrorCodeSchema = z.enum([
  "INVALID_REQUEST",
  "INVALID_AUTOCRYPT_HEADER",
  "PAYLOAD_TOO_LARGE",
  "PACKET_DECODE_ERROR",
  "PACKET_FIELD_ERROR",
  "CONFIG_ERROR",
  "NOT_FOUND",
  "INTERNAL_ERROR",
]);

/**
 * Standard error response schema
 * Used across all endpoints for consistent error handling
 */
export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1, "Error message cannot be empty"),
    code: ErrorCodeSchema,
    requestId: z.string().optional(),
  })
  .openapi("ErrorResponse");

/** Type inferred from ErrorCodeSchema */
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/** Type inferred from ErrorResponseSchema */
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
