import { describe, it, expect } from "vitest";
import {
  generateRequestId,
  getOrGenerateRequestId,
  getRequestId,
  REQUEST_ID_HEADER,
} from "../../../src/utils/request-id.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe("request-id utilities", () => {
  it("generates unique UUID v4 ids", () => {
    const a = generateRequestId();
    const b = generateRequestId();

    expect(a).toMatch(UUID_V4);
    expect(a).not.toBe(b);
  });

  it("takes the id from the X-Request-Id header, trimmed", () => {
    expect(getOrGenerateRequestId({ headers: { "x-request-id": " existing-id-123 " } })).toBe("existing-id-123");
  });

  it("generates an id when the header is missing or blank", () => {
    expect(getOrGenerateRequestId({ headers: {} })).toMatch(UUID_V4);
    expect(getOrGenerateRequestId({ headers: { "x-request-id": "   " } })).toMatch(UUID_V4);
  });

  it("returns a placeholder without a request", () => {
    expect(getRequestId(undefined)).toBe("unknown");
  });

  it("names the standard header", () => {
    expect(REQUEST_ID_HEADER).toBe("X-Request-Id");
  });
});
