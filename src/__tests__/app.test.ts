import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "~/app";
import type { InspectKeyResponse } from "~/schemas";
import type { ErrorResponse } from "~/schemas/errors";
import type { HealthResponse } from "~/schemas/health";
import { HEADERS, TIME } from "~/types";
import type { AppConfig } from "~/utils/config";
import {
  armor,
  bytes,
  creationTime,
  ecdhKeyBody,
  keyExpiration,
  keyFlags,
  publicKey,
  publicSubkey,
  rsaKeyBody,
  signature,
  userId,
  v4Fingerprint,
} from "./helpers/packets";

const parseJson = async <T>(response: Response): Promise<T> =>
  (await response.json()) as T;

const CREATED = 1600000000;
const NOW = 1700000000;
const EXPIRES = CREATED + 5 * 365 * TIME.DAY;

const primaryBody = rsaKeyBody({ created: CREATED });
const keyring = bytes(
  publicKey(primaryBody),
  userId("Alice Example <alice@example.org>"),
  signature({
    hashed: [
      creationTime(CREATED),
      keyFlags(0x03),
      keyExpiration(EXPIRES - CREATED),
    ],
  }),
  publicSubkey(ecdhKeyBody(CREATED)),
  signature({ hashed: [keyFlags(0x0c)], type: 0x18 }),
);
const fingerprint = v4Fingerprint(primaryBody);
const base64Keyring = Buffer.from(keyring).toString("base64");

const baseConfig: AppConfig = {
  NODE_ENV: "test",
  PORT: 8787,
  HOST: "0.0.0.0",
  ALLOWED_ORIGINS: [],
  MAX_KEY_DATA_BYTES: 1024 * 1024,
};

function postJson(body: unknown, headers: Record<string, string> = {}) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  };
}

describe("HTTP application", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe("GET /health", () => {
    it("should report healthy", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/health");

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toContain(
        "application/json",
      );
      const body = await parseJson<HealthResponse>(response);
      expect(body.status).toBe("healthy");
      expect(body.version).toBe("1.0.0");
      expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    });
  });

  describe("404 handler", () => {
    it("should return 404 for unknown routes", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/unknown-route");

      expect(response.status).toBe(404);
      expect(await parseJson<ErrorResponse>(response)).toEqual({
        error: "Not found",
        code: "NOT_FOUND",
      });
    });
  });

  describe("POST /keys/inspect", () => {
    it("should describe armored key material", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson({ keyData: armor(keyring), now: NOW }),
      );

      expect(response.status).toBe(200);
      const body = await parseJson<InspectKeyResponse>(response);
      expect(body.parseable).toBe(true);
      expect(body.keys).toHaveLength(1);
      expect(body.keys[0]).toMatchObject({
        fingerprint,
        capabilities: "cs+e",
        keytypeCode: 1,
        keysize: 2048,
        expires: EXPIRES,
        validity: "?",
        expired: false,
        usable: true,
        canEncrypt: true,
        canSign: true,
        summary: `${fingerprint.slice(-16)}=alice@example.org<${
          EXPIRES.toString(16)
        }/RSA2048/cs+e`,
        uids: [
          {
            name: "Alice Example",
            email: "alice@example.org",
            comment: "",
            display: "Alice Example <alice@example.org>",
          },
        ],
      });
      expect(body.keys[0]?.subkeys[0]).toMatchObject({
        capabilities: "e",
        keytypeCode: 18,
        keysize: 256,
      });
    });

    it("should accept base64 binary data", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson({
          keyData: base64Keyring,
          encoding: "base64",
          fullFingerprint: true,
          now: NOW,
        }),
      );

      expect(response.status).toBe(200);
      const body = await parseJson<InspectKeyResponse>(response);
      expect(body.keys[0]?.summary.startsWith(fingerprint)).toBe(true);
    });

    it("should merge a claim with the default origin", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson({
          keyData: armor(keyring),
          claim: { email: "alice@example.org" },
          now: NOW,
        }),
      );

      const body = await parseJson<InspectKeyResponse>(response);
      expect(body.keys[0]?.uids[0]?.comment).toBe("(Autocrypt)");
    });

    it("should report data that is not OpenPGP", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson({ keyData: "not a key" }),
      );

      expect(response.status).toBe(200);
      expect(await parseJson<InspectKeyResponse>(response)).toEqual({
        parseable: false,
        keys: [],
      });
    });

    it("should reject invalid base64", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson(
          { keyData: "***", encoding: "base64" },
          { [HEADERS.REQUEST_ID]: "req-1" },
        ),
      );

      expect(response.status).toBe(400);
      expect(await parseJson<ErrorResponse>(response)).toEqual({
        error: "keyData is not valid base64",
        code: "INVALID_REQUEST",
        requestId: "req-1",
      });
    });

    it("should reject a request without keyData", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/keys/inspect", postJson({}));

      expect(response.status).toBe(400);
      const body = await parseJson<ErrorResponse>(response);
      expect(body.code).toBe("INVALID_REQUEST");
      expect(body.error).toBe("Validation failed");
    });

    it("should reject a claim with an invalid email", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/keys/inspect",
        postJson({ keyData: "x", claim: { email: "not-an-email" } }),
      );

      expect(response.status).toBe(400);
    });

    it("should reject a body over the configured limit", async () => {
      const app = createApp({ ...baseConfig, MAX_KEY_DATA_BYTES: 64 });
      const response = await app.request(
        "/keys/inspect",
        postJson({ keyData: "A".repeat(200) }),
      );

      expect(response.status).toBe(413);
      const body = await parseJson<ErrorResponse>(response);
      expect(body.error).toBe("Key data too large");
      expect(body.code).toBe("PAYLOAD_TOO_LARGE");
    });
  });

  describe("POST /autocrypt/inspect", () => {
    it("should reconcile the addr with the key", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/autocrypt/inspect",
        postJson({
          header:
            `addr=alice@example.org; prefer-encrypt=mutual; keydata=${base64Keyring}`,
          now: NOW,
        }),
      );

      expect(response.status).toBe(200);
      const body = await parseJson<InspectKeyResponse>(response);
      expect(body.parseable).toBe(true);
      expect(body.keys[0]?.fingerprint).toBe(fingerprint);
      expect(body.keys[0]?.uids.map((u) => u.comment)).toEqual([
        "(Autocrypt)",
      ]);
    });

    it("should reject a header without keydata", async () => {
      const app = createApp(baseConfig);
      const response = await app.request(
        "/autocrypt/inspect",
        postJson({ header: "addr=alice@example.org" }),
      );

      expect(response.status).toBe(400);
      const body = await parseJson<ErrorResponse>(response);
      expect(body.error).toBe("Autocrypt header has no usable keydata");
      expect(body.code).toBe("INVALID_AUTOCRYPT_HEADER");
    });
  });

  describe("middleware", () => {
    it("should echo the request ID", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/health", {
        headers: { [HEADERS.REQUEST_ID]: "test-request" },
      });

      expect(response.headers.get(HEADERS.REQUEST_ID)).toBe("test-request");
    });

    it("should generate a request ID when none is sent", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/health");

      expect(response.headers.get(HEADERS.REQUEST_ID)).toMatch(
        /^[0-9a-f-]{36}$/,
      );
    });

    it("should set security headers", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/health");

      expect(response.headers.get("X-Content-Type-Options")).toBe("nosniff");
      expect(response.headers.get("X-Frame-Options")).toBe("DENY");
      expect(response.headers.get("Content-Security-Policy")).toBe(
        "default-src 'none'; frame-ancestors 'none'",
      );
    });

    it("should allow configured origins only", async () => {
      const app = createApp({
        ...baseConfig,
        ALLOWED_ORIGINS: ["https://app.example.org"],
      });

      const allowed = await app.request("/health", {
        headers: { Origin: "https://app.example.org" },
      });
      const denied = await app.request("/health", {
        headers: { Origin: "https://evil.example.com" },
      });

      expect(allowed.headers.get("Access-Control-Allow-Origin")).toBe(
        "https://app.example.org",
      );
      expect(allowed.headers.get("Access-Control-Expose-Headers")).toBe(
        "X-Request-ID",
      );
      expect(denied.headers.get("Access-Control-Allow-Origin")).toBeNull();
    });

    it("should answer preflight requests", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/keys/inspect", {
        method: "OPTIONS",
        headers: { Origin: "https://app.example.org" },
      });

      expect(response.status).toBe(204);
      expect(response.headers.get("Access-Control-Allow-Methods")).toBe(
        "GET, POST, OPTIONS",
      );
      expect(response.headers.get("Access-Control-Allow-Headers")).toBe(
        "Content-Type, X-Request-ID",
      );
      expect(response.headers.get("Access-Control-Max-Age")).toBe("86400");
    });
  });

  describe("GET /doc", () => {
    it("should serve the OpenAPI document", async () => {
      const app = createApp(baseConfig);
      const response = await app.request("/doc");

      expect(response.status).toBe(200);
      const doc = await parseJson<{
        info: { title: string };
        paths: Record<string, unknown>;
      }>(response);
      expect(doc.info.title).toBe("PGP Key Info API");
      expect(Object.keys(doc.paths).sort()).toEqual([
        "/autocrypt/inspect",
        "/health",
        "/keys/inspect",
      ]);
    });
  });
});
