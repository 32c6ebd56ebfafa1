import { createRoute } from "@hono/zod-openapi";
import { inspectKeyMaterial } from "~/keyinfo";
import { describeKey } from "~/keyinfo/presentation";
import { createOpenAPIApp } from "~/lib/openapi";
import {
  ErrorResponseSchema,
  InspectAutocryptRequestSchema,
  InspectKeyResponseSchema,
  RequestHeadersSchema,
} from "~/schemas";
import { HTTP, unixNow } from "~/types";
import {
  claimFromAutocrypt,
  parseAutocryptHeader,
} from "~/utils/autocrypt";
import type { AutocryptHeader } from "~/utils/autocrypt";
import { isAppError } from "~/utils/errors";
import { logger } from "~/utils/logger";

const app = createOpenAPIApp();

const inspectRoute = createRoute({
  method: "post",
  path: "/inspect",
  summary: "Inspect an Autocrypt header",
  description:
    "Parse the key carried in an Autocrypt header and reconcile its addr "
    + "with the key's user IDs.",
  request: {
    headers: RequestHeadersSchema,
    body: {
      content: {
        "application/json": { schema: InspectAutocryptRequestSchema },
      },
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
      description: "Invalid Autocrypt header",
    },
    413: {
      content: { "application/json": { schema: ErrorResponseSchema } },
      description: "Header too large",
    },
  },
});

app.openapi(inspectRoute, async (c) => {
  const body = c.req.valid("json");
  const log = logger.withContext(c);

  let header: AutocryptHeader;
  try {
    header = parseAutocryptHeader(body.header);
  } catch (error) {
    if (!isAppError(error)) throw error;
    log.warn("Rejected Autocrypt header", {
      reason: error.message,
      ...error.context,
    });
    return c.json(
      {
        error: error.message,
        code: error.code,
        requestId: c.get("requestId"),
      },
      HTTP.BadRequest,
    );
  }

  const now = body.now ?? unixNow();
  const result = await inspectKeyMaterial(header.keydata, {
    claim: claimFromAutocrypt(header),
    now,
    logger: log,
  });
  log.info("Autocrypt key inspected", {
    action: "inspect-autocrypt",
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
