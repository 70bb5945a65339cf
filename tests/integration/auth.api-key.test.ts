import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { loadWorkflowConfig } from "../../src/config/workflow-config.js";
import { createSupportWorkflow } from "../../src/workflow/index.js";
import { setTestSink } from "../../src/utils/telemetry.js";
import { ScriptedProvider } from "../helpers/scripted-abilities.js";

/**
 * API Key Authentication Tests
 *
 * - Missing API key header
 * - Invalid API key
 * - Valid key via X-Support-Api-Key or Bearer
 * - Health check bypass
 */

const payload = {
  customer_name: "Sam",
  email: "sam@example.com",
  query: "Where is my order?",
  priority: "low",
  ticket_id: "TCK-1",
};

describe("API Key Authentication", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    vi.stubEnv("SUPPORT_API_KEYS", "test-secret,second-test-secret");
    const workflow = createSupportWorkflow(await loadWorkflowConfig("config/workflow.yaml"), {
      clients: [new ScriptedProvider("COMMON"), new ScriptedProvider("ATLAS")],
    });
    app = await build({ workflow });
    await app.ready();
  });

  afterEach(() => {
    setTestSink(null);
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it("allows /healthz without an API key", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
  });

  it("lets /health through auth to the not-found handler", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(404);
  });

  it("rejects a request with no key (401 UNAUTHENTICATED)", async () => {
    const events: Array<{ name: string; data: unknown }> = [];
    setTestSink((name, data) => events.push({ name, data }));

    const res = await app.inject({ method: "POST", url: "/v1/support/runs", payload });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      schema: "error.v1",
      code: "UNAUTHENTICATED",
      message: "Missing API key. Provide X-Support-Api-Key header.",
      request_id: res.headers["x-request-id"],
    });
    expect(events).toContainEqual({
      name: "http.auth.failed",
      data: { reason: "missing_header", path: "/v1/support/runs" },
    });
  });

  it("rejects an unknown key", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/support/runs",
      headers: { "x-support-api-key": "wrong-key" },
      payload,
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().message).toBe("Invalid API key.");
  });

  it("accepts a configured key in X-Support-Api-Key", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/support/runs",
      headers: { "x-support-api-key": "second-test-secret" },
      payload,
    });

    expect(res.statusCode).toBe(200);
  });

  it("accepts a configured key as a bearer token", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/support/runs",
      headers: { authorization: "Bearer test-secret" },
      payload,
    });

    expect(res.statusCode).toBe(200);
  });
});

describe("production start-up", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("refuses to start without API keys", async () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("SUPPORT_API_KEYS", "");

    await expect(build()).rejects.toThrow("FATAL: In production, SUPPORT_API_KEYS must be configured");
  });

  it("refuses a wildcard CORS origin", async () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("SUPPORT_API_KEYS", "test-secret");
    vi.stubEnv("ALLOWED_ORIGINS", "*");
    const workflow = createSupportWorkflow(await loadWorkflowConfig("config/workflow.yaml"), {
      clients: [new ScriptedProvider("COMMON"), new ScriptedProvider("ATLAS")],
    });

    await expect(build({ workflow })).rejects.toThrow("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  });
});
