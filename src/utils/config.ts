/**
 * Runtime configuration read from the process environment
 */

import { z } from "@hono/zod-openapi";
import { HTTP } from "~/types";
import { DEFAULTS, LIMITS } from "./constants";
import { AppError } from "./errors";
import { LOG_LEVELS } from "./logger";

export const ConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULTS.PORT),
  HOST: z.string().min(1).default(DEFAULTS.HOST),
  /** Comma-separated list of allowed CORS origins; empty allows any */
  ALLOWED_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  MAX_KEY_DATA_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(LIMITS.MAX_KEY_DATA_BYTES),
  /** Read by the logger from `process.env` */
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/** Validated configuration */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Validate the environment into an {@link AppConfig}
 *
 * @throws {AppError} CONFIG_ERROR listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join("."));
    throw new AppError(
      `Invalid configuration: ${fields.join(", ")}`,
      "CONFIG_ERROR",
      HTTP.InternalServerError,
      { fields },
    );
  }
  return result.data;
}
