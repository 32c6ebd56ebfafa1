import { OpenAPIHono } from "@hono/zod-openapi";
import type { ErrorCode } from "~/schemas/errors";
import type { AppEnv } from "~/types";
import { HTTP } from "~/types";
import { SERVICE_VERSION } from "~/utils/constants";

/**
 * OpenAPI configuration
 */
export const openApiConfig = {
  openapi: "3.0.0",
  info: {
    version: SERVICE_VERSION,
    title: "PGP Key Info API",
    description:
      "Extracts fingerprint, algorithm, expiry, capabilities and identities from OpenPGP key material. Signatures are not verified.",
  },
};

export function createOpenAPIApp() {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c) => {
      if (!result.success) {
        return c.json(
          {
            error: "Validation failed",
            code: "INVALID_REQUEST" as const satisfies ErrorCode,
            issues: result.error.issues,
          },
          HTTP.BadRequest,
        );
      }
      return;
    },
  });
}
