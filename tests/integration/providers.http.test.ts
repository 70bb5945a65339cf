import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildProviderApp } from "../../src/providers/server.js";
import { createDataStoreAbilities } from "../../src/providers/data-store/abilities.js";
import { InMemorySupportStore } from "../../src/providers/data-store/store.js";
import { createLanguageModelAbilities } from "../../src/providers/language-model/abilities.js";

describe("reference provider HTTP app", () => {
  let atlas: FastifyInstance;
  let common: FastifyInstance;

  beforeAll(async () => {
    atlas = await buildProviderApp("ATLAS", createDataStoreAbilities({ store: new InMemorySupportStore() }), {
      health: () => ({ store_status: "in_memory" }),
    });
    common = await buildProviderApp("COMMON", createLanguageModelAbilities());
    await Promise.all([atlas.ready(), common.ready()]);
  });

  afterAll(async () => {
    await Promise.all([atlas.close(), common.close()]);
  });

  it("reports health with its abilities", async () => {
    const res = await atlas.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({ status: "healthy", provider: "ATLAS", store_status: "in_memory" });
    expect(body.available_abilities).toHaveLength(15);
    expect(typeof body.timestamp).toBe("string");
  });

  it("serves an ability from payload and state", async () => {
    const res = await atlas.inject({
      method: "POST",
      url: "/abilities/escalation_decision",
      payload: { payload: {}, state: { priority: "HIGH", sentiment: "positive" } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ escalated: true, escalation_reason: "Priority: high, Sentiment: positive" });
  });

  it("treats a missing body as empty payload and state", async () => {
    const res = await common.inject({ method: "POST", url: "/abilities/solution_evaluation" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ solution_score: 80 });
  });

  it("answers an unknown ability with 404", async () => {
    const res = await common.inject({
      method: "POST",
      url: "/abilities/teleport",
      headers: { "x-request-id": "req-404" },
      payload: {},
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      schema: "error.v1",
      code: "NOT_FOUND",
      message: "Unknown ability: teleport",
      details: { provider: "COMMON" },
      request_id: "req-404",
    });
    expect(res.headers["x-request-id"]).toBe("req-404");
  });

  it("does not resolve inherited object properties as abilities", async () => {
    const res = await common.inject({ method: "POST", url: "/abilities/toString", payload: {} });

    expect(res.statusCode).toBe(404);
  });

  it("rejects a body whose state is not an object", async () => {
    const res = await atlas.inject({
      method: "POST",
      url: "/abilities/close_ticket",
      payload: { state: "closed" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ schema: "error.v1", code: "BAD_INPUT", message: "Validation failed" });
  });
});
