import { z } from "@hono/zod-openapi";

/**
 * Common request headers schema
 */
export const RequestHeadersSchema = z
  .object({
    "X-Request-ID": z.string().max(128).optional(),
  })
  .openapi("RequestHeaders");
