import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "~/types";
import { HEADERS } from "~/types";

/**
 * Get request ID from header or generate a new one
 */
export function getRequestId(headerValue?: string | null): string {
  return headerValue || randomUUID();
}

/**
 * Request ID middleware - ensures every request has a unique ID
 */
export const requestId: MiddlewareHandler<AppEnv> = async (c, next) => {
  const requestId = getRequestId(c.req.header(HEADERS.REQUEST_ID));

  c.set("requestId", requestId);

  await next();

  c.header(HEADERS.REQUEST_ID, requestId);
};
