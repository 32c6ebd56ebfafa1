/**
 * Structured logger
 *
 * JSON lines outside development, `[LEVEL] message context` in development.
 * `LOG_LEVEL` sets the threshold; it defaults to `debug` in development and
 * `info` everywhere else.
 */

import type { Context } from "hono";
import { HEADERS } from "~/types";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  requestId?: string;
  action?: string;
  [key: string]: unknown;
}

/** Minimal logging surface accepted by the key interpreter */
export interface KeyInfoLogger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function thresholdFor(isDevelopment: boolean): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return isDevelopment ? "debug" : "info";
}

class Logger implements KeyInfoLogger {
  private readonly isDevelopment = process.env.NODE_ENV === "development";
  private readonly threshold = LOG_LEVELS.indexOf(
    thresholdFor(this.isDevelopment),
  );

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    if (this.isDevelopment) {
      console.log(`[${level.toUpperCase()}]`, message, context || "");
      return;
    }

    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...context,
      }),
    );
  }

  private serializeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
      return error;
    }
    return {
      message: error.message,
      name: error.name,
      stack: this.isDevelopment ? error.stack : undefined,
    };
  }

  debug(message: string, context?: LogContext) {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext) {
    this.write("error", message, {
      ...context,
      error: this.serializeError(error),
    });
  }

  /** Bind a fixed context to every entry */
  child(context: LogContext): ChildLogger {
    return new ChildLogger(this, context);
  }

  /**
   * Bind the request ID, taken from the context variable or the header
   */
  withContext(c: Context): ChildLogger {
    const requestId: string | undefined =
      c.get("requestId") || c.req.header(HEADERS.REQUEST_ID);
    return this.child({ requestId });
  }
}

export class ChildLogger implements KeyInfoLogger {
  constructor(
    private readonly parent: Logger,
    private readonly context: LogContext,
  ) {}

  private merge(context?: LogContext): LogContext {
    return { ...this.context, ...context };
  }

  debug(message: string, context?: LogContext) {
    this.parent.debug(message, this.merge(context));
  }

  info(message: string, context?: LogContext) {
    this.parent.info(message, this.merge(context));
  }

  warn(message: string, context?: LogContext) {
    this.parent.warn(message, this.merge(context));
  }

  error(message: string, error?: unknown, context?: LogContext) {
    this.parent.error(message, error, this.merge(context));
  }
}

export const logger = new Logger();
