/**
 * Error handling utilities
 */

import type { Context } from "hono";
import type { ErrorCode } from "~/schemas/errors";
import { HTTP } from "~/types";
import { logger } from "./logger";

/** Statuses an error response may carry */
export type ErrorStatus =
  | HTTP.BadRequest
  | HTTP.NotFound
  | HTTP.ContentTooLarge
  | HTTP.InternalServerError;

interface ErrorOptions {
  code: ErrorCode;
  status?: ErrorStatus;
  requestId?: string;
  context?: Record<string, unknown>;
}

/**
 * Standardized error response
 */
export function errorResponse(
  c: Context,
  message: string,
  options: ErrorOptions,
) {
  const {
    code,
    status = HTTP.InternalServerError,
    requestId,
    context,
  } = options;

  // Log the error
  logger.error(message, undefined, {
    code,
    status,
    ...(requestId && { requestId }),
    ...context,
  });

  return c.json(
    { error: message, code, ...(requestId && { requestId }) },
    status,
  );
}

/**
 * Handle unknown errors
 */
export function handleUnknownError(
  c: Context,
  error: unknown,
  fallbackMessage: string,
  code: ErrorCode,
): Response {
  if (isAppError(error)) {
    return errorResponse(c, error.message, {
      code: error.code,
      status: error.status,
      requestId: c.get("requestId"),
      context: error.context,
    });
  }

  const requestId: string | undefined = c.get("requestId");
  logger.error("Unhandled error", error, { code, requestId });

  return errorResponse(c, fallbackMessage, {
    code,
    requestId,
    status: HTTP.InternalServerError,
  });
}

/**
 * Create typed error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: ErrorStatus = HTTP.InternalServerError,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * The input is not OpenPGP data at all: bad armor, bad framing, truncated
 * stream. Callers report "not parseable" and keep no partial result.
 */
export class PacketDecodeError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PACKET_DECODE_ERROR", HTTP.BadRequest, context);
    this.name = "PacketDecodeError";
  }
}

/**
 * One packet is missing a field or carries a value out of range.
 * Only that packet's contribution is lost.
 */
export class PacketFieldError extends AppError {
  constructor(
    message: string,
    public readonly tag: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "PACKET_FIELD_ERROR", HTTP.BadRequest, {
      tag,
      ...context,
    });
    this.name = "PacketFieldError";
  }
}

/**
 * Type guard for AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/** Error message for logging, whatever was thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
