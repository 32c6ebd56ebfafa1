import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { requestId } from "~/middleware/request-id";
import type { AppEnv } from "~/types";
import { HEADERS } from "~/types";

// Tests for development mode logging
describe("Logger - Development Mode", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    // Set development mode before importing
    process.env.NODE_ENV = "development";
    vi.resetModules();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    vi.resetModules();
    process.env.NODE_ENV = "test";
  });

  it("should log debug messages in development mode", async () => {
    const { logger: devLogger } = await import("~/utils/logger");
    const context = { tag: 2 };

    devLogger.debug("Packet viewed", context);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "[DEBUG]",
      "Packet viewed",
      context,
    );
  });

  it("should print an empty context as an empty string", async () => {
    const { logger: devLogger } = await import("~/utils/logger");

    devLogger.warn("Malformed packet skipped");

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "[WARN]",
      "Malformed packet skipped",
      "",
    );
  });

  it("should include the stack of an error", async () => {
    const { logger: devLogger } = await import("~/utils/logger");
    const error = new Error("boom");

    devLogger.error("Unhandled error", error);

    const logContext = consoleLogSpy.mock.calls[0]?.[2] as {
      error: { message: string; name: string; stack?: string };
    };
    expect(logContext.error.message).toBe("boom");
    expect(logContext.error.name).toBe("Error");
    expect(logContext.error.stack).toBe(error.stack);
  });
});

// Tests for JSON logging outside development
describe("Logger", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  const lastEntry = (): Record<string, unknown> =>
    JSON.parse(String(consoleLogSpy.mock.calls.at(-1)?.[0]));

  it("should emit one JSON line per entry", async () => {
    const { logger } = await import("~/utils/logger");

    logger.info("Key material inspected", { parseable: true, keys: 1 });

    const entry = lastEntry();
    expect(entry.level).toBe("info");
    expect(entry.message).toBe("Key material inspected");
    expect(entry.parseable).toBe(true);
    expect(entry.keys).toBe(1);
    expect(typeof entry.timestamp).toBe("string");
  });

  it("should skip debug entries", async () => {
    const { logger } = await import("~/utils/logger");

    logger.debug("Packet viewed", { tag: 6 });

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("should leave the stack out of errors", async () => {
    const { logger } = await import("~/utils/logger");

    logger.error("Unhandled error", new TypeError("bad"), { code: "X" });

    expect(lastEntry()).toMatchObject({
      level: "error",
      code: "X",
      error: { message: "bad", name: "TypeError" },
    });
    expect(lastEntry().error).not.toHaveProperty("stack");
  });

  it("should log non-Error values as they are", async () => {
    const { logger } = await import("~/utils/logger");

    logger.error("Unhandled error", "plain string");

    expect(lastEntry().error).toBe("plain string");
  });

  describe("withContext", () => {
    async function logThrough(
      app: Hono<AppEnv>,
      headers: Record<string, string> = {},
    ) {
      const { logger } = await import("~/utils/logger");
      app.get("/", (c) => {
        logger.withContext(c).warn("Rejected key data", { reason: "test" });
        return c.text("ok");
      });
      await app.request("/", { headers });
      return consoleLogSpy.mock.calls
        .map((call): Record<string, unknown> => JSON.parse(String(call[0])))
        .find((entry) => entry.message === "Rejected key data");
    }

    it("should take the request ID from the context", async () => {
      const app = new Hono<AppEnv>();
      app.use("*", requestId);

      const entry = await logThrough(app, { [HEADERS.REQUEST_ID]: "ctx-1" });

      expect(entry).toMatchObject({
        level: "warn",
        requestId: "ctx-1",
        reason: "test",
      });
    });

    it("should fall back to the request header", async () => {
      const entry = await logThrough(new Hono<AppEnv>(), {
        [HEADERS.REQUEST_ID]: "header-1",
      });

      expect(entry?.requestId).toBe("header-1");
    });

    it("should let call context override the bound context", async () => {
      const { logger } = await import("~/utils/logger");
      const app = new Hono<AppEnv>();
      app.use("*", requestId);
      app.get("/", (c) => {
        logger.withContext(c).info("Override", { requestId: "explicit" });
        return c.text("ok");
      });

      await app.request("/", { headers: { [HEADERS.REQUEST_ID]: "bound" } });

      expect(lastEntry().requestId).toBe("explicit");
    });
  });
});

describe("Logger - LOG_LEVEL", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.resetModules();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    delete process.env.LOG_LEVEL;
    vi.resetModules();
  });

  it("should drop entries below the configured level", async () => {
    process.env.LOG_LEVEL = "WARN";
    const { logger } = await import("~/utils/logger");

    logger.info("Key material inspected");
    logger.warn("Malformed packet skipped");

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleLogSpy.mock.calls[0]?.[0])).toContain(
      '"level":"warn"',
    );
  });

  it("should log debug entries when asked to", async () => {
    process.env.LOG_LEVEL = "debug";
    const { logger } = await import("~/utils/logger");

    logger.debug("Packet viewed", { tag: 13 });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });

  it("should fall back to info for an unknown level", async () => {
    process.env.LOG_LEVEL = "verbose";
    const { logger } = await import("~/utils/logger");

    logger.debug("Packet viewed");
    logger.info("Server listening");

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });
});

describe("Logger - child", () => {
  it("should merge bound context into every entry", async () => {
    const consoleLogSpy = vi
      .spyOn(console, "log")
      .mockImplementation(() => {});
    const { logger } = await import("~/utils/logger");

    logger.child({ action: "inspect" }).warn("Packet skipped", { tag: 2 });

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toMatchObject(
      { level: "warn", action: "inspect", tag: 2 },
    );
    consoleLogSpy.mockRestore();
  });
});
