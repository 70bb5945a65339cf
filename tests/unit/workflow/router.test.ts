import { describe, it, expect, afterEach } from "vitest";
import { decideRoute, selectBranch } from "../../../src/workflow/router.js";
import { RequestState } from "../../../src/workflow/state.js";
import { setTestSink } from "../../../src/utils/telemetry.js";
import { ScriptedProvider } from "../../helpers/scripted-abilities.js";

describe("selectBranch", () => {
  it.each([
    [0, "UPDATE"],
    [80, "UPDATE"],
    [89.99, "UPDATE"],
    [90, "CREATE"],
    [95, "CREATE"],
    [100, "CREATE"],
  ] as const)("score %s → %s", (score, branch) => {
    expect(selectBranch(score)).toBe(branch);
  });
});

describe("decideRoute", () => {
  afterEach(() => {
    setTestSink(null);
  });

  const provider = () =>
    new ScriptedProvider("ATLAS", {
      escalation_decision: { escalated: true, escalation_reason: "Priority: high, Sentiment: neutral" },
      update_payload: (state) => ({
        decision_notes: `Score=${state.get("solution_score") ?? 0}; escalated=${state.get("escalated") === true}`,
      }),
    });

  it("below 90 decides escalation and merges straight into state", async () => {
    const state = new RequestState({ priority: "high" });
    state.merge({ solution_score: 80 });
    const abilities = provider();

    const branch = await decideRoute(state, abilities);

    expect(branch).toBe("UPDATE");
    expect(abilities.abilitiesCalled()).toEqual(["escalation_decision", "update_payload"]);
    expect(state.get("escalated")).toBe(true);
    // update_payload saw the escalation decision
    expect(state.get("decision_notes")).toBe("Score=80; escalated=true");
    expect(state.logs.at(-1)).toBe("Router: score 80 < 90 → UPDATE.");
  });

  it("at 90 or above clears escalation without asking for a decision", async () => {
    const state = new RequestState({});
    state.merge({ solution_score: 90, escalated: true });
    const abilities = provider();

    const branch = await decideRoute(state, abilities);

    expect(branch).toBe("CREATE");
    expect(abilities.abilitiesCalled()).toEqual(["update_payload"]);
    expect(state.get("escalated")).toBe(false);
    expect(state.get("decision_notes")).toBe("Score=90; escalated=false");
    expect(state.logs.at(-1)).toBe("Router: score 90 ≥ 90 → CREATE.");
  });

  it("treats a missing score as 0", async () => {
    const state = new RequestState({});
    const events: Array<Record<string, unknown>> = [];
    setTestSink((name, data) => {
      if (name === "support.route.selected") events.push(data);
    });

    expect(await decideRoute(state, provider())).toBe("UPDATE");
    expect(state.logs.at(-1)).toBe("Router: score 0 < 90 → UPDATE.");
    expect(events).toEqual([{ run_id: state.runId, score: 0, branch: "UPDATE" }]);
  });
});
