import { describe, it, expect } from "vitest";
import { isEmptyUpdate, RequestState, sanitizeUpdate } from "../../../src/workflow/state.js";

describe("sanitizeUpdate", () => {
  it("keeps well-typed derived fields", () => {
    const { update, dropped } = sanitizeUpdate({
      intent: "refund_request",
      confidence: 0.8,
      kb_results: [{ title: "Policy" }],
    });

    expect(update).toEqual({ intent: "refund_request", confidence: 0.8, kb_results: [{ title: "Policy" }] });
    expect(dropped).toEqual([]);
  });

  it("drops logs, input fields, unknown keys and wrong types with a reason each", () => {
    const { update, dropped } = sanitizeUpdate({
      intent: "refund_request",
      logs: ["injected"],
      email: "other@example.com",
      accepted: true,
      solution_score: "high",
    });

    expect(update).toEqual({ intent: "refund_request" });
    expect(dropped).toEqual([
      { key: "logs", reason: "logs_field" },
      { key: "email", reason: "input_field" },
      { key: "accepted", reason: "unknown_field" },
      { key: "solution_score", reason: "invalid_type" },
    ]);
  });

  it("treats null values as absent without reporting them", () => {
    const { update, dropped } = sanitizeUpdate({ entities: null, escalated: false });

    expect(update).toEqual({ escalated: false });
    expect(dropped).toEqual([]);
  });
});

describe("isEmptyUpdate", () => {
  it("is true only for an update without keys", () => {
    expect(isEmptyUpdate({})).toBe(true);
    expect(isEmptyUpdate({ closed: false })).toBe(false);
  });
});

describe("RequestState", () => {
  it("starts from the input with an empty log", () => {
    const state = new RequestState({ customer_name: "Sam", query: "Where is my order?" }, "run-1");

    expect(state.runId).toBe("run-1");
    expect(state.get("customer_name")).toBe("Sam");
    expect(state.logs).toEqual([]);
  });

  it("merges updates with new values winning and keeps other keys", () => {
    const state = new RequestState({ query: "q" });
    state.merge({ intent: "general_inquiry", confidence: 0.5 });
    state.merge({ intent: "refund_request" });

    expect(state.get("intent")).toBe("refund_request");
    expect(state.get("confidence")).toBe(0.5);
    expect(state.get("query")).toBe("q");
  });

  it("returns snapshots detached from the live state", () => {
    const state = new RequestState({ query: "q" });
    state.merge({ flags: { sla_risk: 1 } });
    state.log("first");

    const snapshot = state.snapshot();
    snapshot.logs.push("tampered");
    snapshot.flags = { sla_risk: 99 };

    expect(state.logs).toEqual(["first"]);
    expect(state.get("flags")).toEqual({ sla_risk: 1 });
  });

  it("generates a run id when none is given", () => {
    const a = new RequestState({});
    const b = new RequestState({});
    expect(a.runId).not.toBe(b.runId);
  });
});
