import { createRoute } from "@hono/zod-openapi";
import { inspectKeyMaterial } from "~/keyinfo";
import { describeKey } from "~/keyinfo/presentation";
import { createOpenAPIApp } from "~/lib/openapi";
import {
  ErrorResponseSchema,
  InspectKeyRequestSchema,
  InspectKeyResponseSchema,
  RequestHeadersSchema,
} from "~/schemas";
import type { ErrorCode } from "~/schemas/errors";
import type { IdentityClaim } from "~/types";
import { HTTP, unixNow } from "~/types";
import { DEFAULTS } from "~/utils/constants";
import { logger } from "~/utils/logger";

const app = createOpenAPIApp();

const BASE64_KEY = /^[A-Za-z0-9+/\s]+={0,2}\s*$/;

const inspectRoute = createRoute({
  method: "post",
  path: "/inspect",
  summary: "Inspect key material",
  description:
    "Extract key metadata from ASCII-armored or base64-encoded binary OpenPGP data. "
    + "`parseable: false` means the input is not OpenPGP data at all.",
  request: {
    headers: RequestHeadersSchema,
    body: {
      content: { "application/json": { schema: InspectKeyRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: {
      content: { "application/json": { schema: InspectKeyResponseSchema } },
      description: "Extracted keys",
    },
    400: {
      content: { "application/json": { schema: ErrorResponseSchema } },
      description: "Invalid request",
    },
    413: {
      content: { "application/json": { schema: ErrorResponseSchema } },
      description: "Key data too large",
    },
  },
});

app.openapi(inspectRoute, async (c) => {
  const body = c.req.valid("json");
  const log = logger.withContext(c);

  if (body.encoding === "base64" && !BASE64_KEY.test(body.keyData)) {
    log.warn("Rejected key data", { reason: "invalid base64" });
    return c.json(
      {
        error: "keyData is not valid base64",
        code: "INVALID_REQUEST" as const satisfies ErrorCode,
        requestId: c.get("requestId"),
      },
      HTTP.BadRequest,
    );
  }

  const data = body.encoding === "base64"
    ? new Uint8Array(Buffer.from(body.keyData.replace(/\s+/g, ""), "base64"))
    : body.keyData;
  const claim: IdentityClaim | undefined = body.claim && {
    email: body.claim.email,
    origin: body.claim.origin ?? DEFAULTS.AUTOCRYPT_ORIGIN,
  };
  const now = body.now ?? unixNow();

  const result = await inspectKeyMaterial(data, { claim, now, logger: log });
  log.info("Key material inspected", {
    action: "inspect",
    parseable: result.parseable,
    keys: result.keys.length,
  });

  return c.json(
    {
      parseable: result.parseable,
      keys: result.keys.map((key) =>
        describeKey(key, { fullFingerprint: body.fullFingerprint, now })
      ),
    },
    HTTP.OK,
  );
});

export default app;
