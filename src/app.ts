import { swaggerUI } from "@hono/swagger-ui";
import { createRoute } from "@hono/zod-openapi";
import { bodyLimit } from "hono/body-limit";
import { logger as requestLogger } from "hono/logger";
import { createOpenAPIApp, openApiConfig } from "~/lib/openapi";
import { requestId } from "~/middleware/request-id";
import { restrictedCors, securityHeaders } from "~/middleware/security";
import autocryptRoutes from "~/routes/autocrypt";
import keyRoutes from "~/routes/keys";
import { HealthResponseSchema } from "~/schemas";
import type { HealthResponse } from "~/schemas/health";
import { HTTP } from "~/types";
import type { AppConfig } from "~/utils/config";
import { loadConfig } from "~/utils/config";
import { SERVICE_VERSION } from "~/utils/constants";
import { errorResponse, handleUnknownError } from "~/utils/errors";
import { logger } from "~/utils/logger";

const healthRoute = createRoute({
  method: "get",
  path: "/health",
  summary: "Health check",
  description: "Check the health of the service",
  responses: {
    200: {
      content: { "application/json": { schema: HealthResponseSchema } },
      description: "Service is healthy",
    },
  },
});

/**
 * Build the HTTP application
 *
 * Pass a config explicitly in tests; the default reads `process.env`.
 */
export function createApp(config: AppConfig = loadConfig()) {
  const app = createOpenAPIApp();

  // Global middleware
  app.use("*", requestLogger((message) => logger.info(message)));
  app.use("*", requestId);
  app.use("*", securityHeaders);
  app.use("*", restrictedCors(config.ALLOWED_ORIGINS));

  const limit = bodyLimit({
    maxSize: config.MAX_KEY_DATA_BYTES,
    onError: (c) =>
      errorResponse(c, "Key data too large", {
        code: "PAYLOAD_TOO_LARGE",
        status: HTTP.ContentTooLarge,
        requestId: c.get("requestId"),
        context: { maxSize: config.MAX_KEY_DATA_BYTES },
      }),
  });
  app.use("/keys/*", limit);
  app.use("/autocrypt/*", limit);

  app.openapi(healthRoute, (c) => {
    const response: HealthResponse = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
    };
    return c.json(response, HTTP.OK);
  });

  app.route("/keys", keyRoutes);
  app.route("/autocrypt", autocryptRoutes);

  // OpenAPI Docs
  app.doc("/doc", openApiConfig);

  // Swagger UI
  app.get("/ui", swaggerUI({ url: "/doc" }));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "Not found", code: "NOT_FOUND" }, HTTP.NotFound);
  });

  // Error handler
  app.onError((err, c) => {
    return handleUnknownError(c, err, "Internal server error", "INTERNAL_ERROR");
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
