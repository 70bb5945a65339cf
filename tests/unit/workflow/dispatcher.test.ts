import { describe, it, expect } from "vitest";
import { CapabilityRegistry } from "../../../src/workflow/capability-registry.js";
import { AbilityDispatcher } from "../../../src/workflow/dispatcher.js";
import { RequestState } from "../../../src/workflow/state.js";
import { WorkflowConfigError } from "../../../src/config/workflow-config.js";
import { FAIL, ScriptedProvider } from "../../helpers/scripted-abilities.js";

describe("AbilityDispatcher", () => {
  const registry = new CapabilityRegistry([["extract_entities", "ATLAS"]], "COMMON");

  it("routes each ability to the provider the registry names", async () => {
    const common = new ScriptedProvider("COMMON", { parse_request_text: { parsed: { intent: "general_query" } } });
    const atlas = new ScriptedProvider("ATLAS", { extract_entities: { entities: { urgency: "high" } } });
    const dispatcher = new AbilityDispatcher(registry, [common, atlas]);
    const state = new RequestState({ query: "q" });

    expect(await dispatcher.call("extract_entities", {}, state)).toEqual({ entities: { urgency: "high" } });
    expect(await dispatcher.call("parse_request_text", {}, state)).toEqual({ parsed: { intent: "general_query" } });
    expect(atlas.abilitiesCalled()).toEqual(["extract_entities"]);
    expect(common.abilitiesCalled()).toEqual(["parse_request_text"]);
  });

  it("passes the payload through unchanged", async () => {
    const common = new ScriptedProvider("COMMON");
    const dispatcher = new AbilityDispatcher(registry, [common, new ScriptedProvider("ATLAS")]);

    await dispatcher.call("generate_response", { system_message: "be brief" }, new RequestState({}));

    expect(common.calls[0].payload).toEqual({ system_message: "be brief" });
  });

  it("exposes the full outcome through invoke", async () => {
    const dispatcher = new AbilityDispatcher(registry, [
      new ScriptedProvider("COMMON"),
      new ScriptedProvider("ATLAS", { extract_entities: FAIL }),
    ]);

    const outcome = await dispatcher.invoke("extract_entities", {}, new RequestState({}));

    expect(outcome).toMatchObject({ kind: "failed", provider: "ATLAS", update: {} });
  });

  it("refuses to start when a provider has no client", () => {
    expect(() => new AbilityDispatcher(registry, [new ScriptedProvider("COMMON")])).toThrow(WorkflowConfigError);
    expect(() => new AbilityDispatcher(registry, [new ScriptedProvider("COMMON")])).toThrow(
      "No client configured for provider(s): ATLAS",
    );
  });
});
