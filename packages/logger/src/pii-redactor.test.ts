import { describe, it, expect } from "vitest";
import { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "secret123")).toBe("[REDACTED]");
      expect(redactValue("token", "jwt-token")).toBe("[REDACTED]");
      expect(redactValue("apikey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("api_key", "test-key")).toBe("[REDACTED]");
      expect(redactValue("openaiApiKey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("cohere_api_key", "test-key")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Bearer xyz")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "secret123")).toBe("[REDACTED]");
      expect(redactValue("OPENAIAPIKEY", "test-key")).toBe("[REDACTED]");
    });

    it("redacts email addresses in string values", () => {
      const result = redactValue("clause", "Notices go to legal@example.com within 10 days");
      expect(result).toBe("Notices go to [REDACTED] within 10 days");
    });

    it("redacts multiple email addresses", () => {
      expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    });

    it("leaves non-sensitive values alone", () => {
      expect(redactValue("documentKey", "abc123")).toBe("abc123");
      expect(redactValue("chunkCount", 42)).toBe(42);
      expect(redactValue("cacheHit", true)).toBe(true);
      expect(redactValue("data", null)).toBe(null);
      expect(redactValue("name", "")).toBe("");
    });
  });

  describe("redactRecord", () => {
    it("redacts each top-level property", () => {
      expect(
        redactRecord({ apiKey: "test-key", query: "ask bob@example.com", topK: 5 }),
      ).toEqual({ apiKey: "[REDACTED]", query: "ask [REDACTED]", topK: 5 });
    });
  });

  describe("REDACT_PATHS", () => {
    it("has both top-level and nested for each sensitive key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });

    it("covers the backend credentials", () => {
      expect(REDACT_PATHS).toContain("openaiApiKey");
      expect(REDACT_PATHS).toContain("*.cohereApiKey");
    });
  });
});
