import { z } from "@hono/zod-openapi";

/**
 * ISO8601 datetime validation with timezone offset
 */
export const TimestampSchema = z.iso.datetime({
  offset: true,
  message: "Must be valid ISO8601 timestamp with timezone",
});

/**
 * Health check response schema
 */
export const HealthResponseSchema = z
  .object({
    status: z.literal("healthy"),
    timestamp: TimestampSchema,
    version: z.string().regex(/^\d+\.\d+\.\d+$/, "Must be semantic version"),
  })
  .openapi("HealthResponse");

/** Type inferred from HealthResponseSchema */
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
