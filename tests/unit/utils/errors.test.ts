import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  getStatusCodeForErrorCode,
  scrubMessage,
  toErrorV1,
  zodErrorToErrorV1,
  type ErrorCode,
} from "../../../src/utils/errors.js";

describe("error utilities", () => {
  describe("buildErrorV1", () => {
    it("builds the minimal envelope", () => {
      expect(buildErrorV1("BAD_INPUT", "Invalid request")).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Invalid request",
      });
    });

    it("omits empty details and includes the request id", () => {
      expect(buildErrorV1("INTERNAL", "Server error", {}, "req-123")).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Server error",
        request_id: "req-123",
      });
    });
  });

  describe("zodErrorToErrorV1", () => {
    it("flattens validation errors into details", () => {
      const result = z.object({ query: z.string() }).safeParse({ query: 123 });
      expect(result.success).toBe(false);
      if (result.success) return;

      expect(zodErrorToErrorV1(result.error, "req-456")).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Validation failed",
        details: {
          validation_errors: { formErrors: [], fieldErrors: { query: ["Expected string, received number"] } },
        },
        request_id: "req-456",
      });
    });
  });

  describe("scrubMessage", () => {
    it("removes paths, key assignments and email addresses", () => {
      expect(scrubMessage("Cannot open /srv/app/data/seed.json")).toBe("Cannot open [path]");
      expect(scrubMessage("OPENAI_API_KEY=test-secret rejected")).toBe("[KEY_REDACTED] rejected");
      expect(scrubMessage("CLIENT_SECRET=test-secret rejected")).toBe("[SECRET_REDACTED] rejected");
      expect(scrubMessage("no customer aisha@example.com")).toBe("no customer [email]");
    });
  });

  describe("toErrorV1", () => {
    it("maps zod errors to BAD_INPUT", () => {
      const result = z.string().safeParse(1);
      if (result.success) throw new Error("expected failure");

      expect(toErrorV1(result.error).code).toBe("BAD_INPUT");
    });

    it("maps rate limiting to RATE_LIMITED", () => {
      expect(toErrorV1(Object.assign(new Error("slow down"), { statusCode: 429 }))).toEqual({
        schema: "error.v1",
        code: "RATE_LIMITED",
        message: "Too many requests",
      });
    });

    it("maps an oversized body to BAD_INPUT", () => {
      const error = Object.assign(new Error("Request body is too large"), {
        statusCode: 413,
        code: "FST_ERR_CTP_BODY_TOO_LARGE",
      });

      expect(toErrorV1(error).message).toBe("Request body too large");
      expect(toErrorV1(error).code).toBe("BAD_INPUT");
    });

    it("keeps the message of other client errors", () => {
      const malformed = Object.assign(new Error("Body is not valid JSON"), { statusCode: 400 });
      const missing = Object.assign(new Error("Not here"), { statusCode: 404 });

      expect(toErrorV1(malformed)).toEqual({ schema: "error.v1", code: "BAD_INPUT", message: "Body is not valid JSON" });
      expect(toErrorV1(missing).code).toBe("NOT_FOUND");
    });

    it("scrubs unexpected errors", () => {
      expect(toErrorV1(new Error("crash reading /etc/support/keys"))).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "crash reading [path]",
      });
      expect(toErrorV1("plain failure").message).toBe("plain failure");
      expect(toErrorV1(42).message).toBe("An unexpected error occurred");
    });
  });

  describe("getStatusCodeForErrorCode", () => {
    it.each<[ErrorCode, number]>([
      ["BAD_INPUT", 400],
      ["UNAUTHENTICATED", 401],
      ["NOT_FOUND", 404],
      ["RATE_LIMITED", 429],
      ["INTERNAL", 500],
    ])("%s → %i", (code, status) => {
      expect(getStatusCodeForErrorCode(code)).toBe(status);
    });
  });
});
