import type { MiddlewareHandler } from "hono";
import { HEADERS, HTTP } from "~/types";

/**
 * Security headers middleware for production hardening
 */
export const securityHeaders: MiddlewareHandler = async (c, next) => {
  await next();

  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "no-referrer");
  c.header("Permissions-Policy", "geolocation=(), microphone=(), camera=()");
  // The Swagger UI page loads its assets from a CDN
  if (!c.req.path.startsWith("/ui")) {
    c.header(
      HEADERS.CONTENT_SECURITY_POLICY,
      "default-src 'none'; frame-ancestors 'none'",
    );
  }

  c.res.headers.delete("X-Powered-By");
};

/**
 * CORS middleware restricted to the configured origins
 *
 * An empty list allows any origin.
 */
export function restrictedCors(
  allowedOrigins: readonly string[],
): MiddlewareHandler {
  return async (c, next) => {
    const origin = c.req.header(HEADERS.ORIGIN);

    const isAllowed = allowedOrigins.length === 0
      || (origin !== undefined && allowedOrigins.includes(origin));

    if (c.req.method === "OPTIONS") {
      if (isAllowed && origin !== undefined) {
        return new Response(null, {
          status: HTTP.NoContent,
          headers: {
            [HEADERS.ALLOW_ORIGIN]: origin,
            [HEADERS.ALLOW_METHODS]: "GET, POST, OPTIONS",
            [HEADERS.ALLOW_HEADERS]: `Content-Type, ${HEADERS.REQUEST_ID}`,
            [HEADERS.MAX_AGE]: "86400",
          },
        });
      }
      return new Response(null, { status: HTTP.NoContent });
    }

    await next();

    if (isAllowed && origin !== undefined) {
      c.header(HEADERS.ALLOW_ORIGIN, origin);
      c.header(HEADERS.EXPOSE_HEADERS, HEADERS.REQUEST_ID);
    }

    return;
  };
}
