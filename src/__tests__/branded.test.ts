import { describe, expect, it } from "vitest";
import { createKeyFingerprint, normalizeEmail } from "~/types/branded";

describe("Branded Types", () => {
  describe("createKeyFingerprint", () => {
    it("should accept a v4 fingerprint", () => {
      const value = "0123456789ABCDEF0123456789ABCDEF01234567";
      expect(createKeyFingerprint(value)).toBe(value);
    });

    it("should normalize lowercase to uppercase", () => {
      expect(createKeyFingerprint("abcdef".repeat(6) + "0123")).toBe(
        "ABCDEF".repeat(6) + "0123",
      );
    });

    it("should accept v3 and v6 lengths", () => {
      expect(createKeyFingerprint("A".repeat(32))).toHaveLength(32);
      expect(createKeyFingerprint("b".repeat(64))).toBe("B".repeat(64));
    });

    it("should reject other lengths", () => {
      expect(() => createKeyFingerprint("A".repeat(39))).toThrow(
        `Invalid KeyFingerprint format: ${"A".repeat(39)}`,
      );
      expect(() => createKeyFingerprint("")).toThrow(
        "Invalid KeyFingerprint format: ",
      );
    });

    it("should reject non-hex characters", () => {
      expect(() => createKeyFingerprint("G".repeat(40))).toThrow(
        "Invalid KeyFingerprint format",
      );
    });
  });

  describe("normalizeEmail", () => {
    it("should trim and lowercase", () => {
      expect(normalizeEmail("  Alice@Example.ORG ")).toBe("alice@example.org");
    });

    it("should make differently cased addresses equal", () => {
      expect(normalizeEmail("BOB@example.org")).toBe(
        normalizeEmail("bob@EXAMPLE.org"),
      );
    });
  });
});
