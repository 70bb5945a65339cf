import { describe, it, expect, afterEach } from "vitest";
import { buildCapabilityRegistry, CapabilityRegistry } from "../../../src/workflow/capability-registry.js";
import { parseWorkflowConfig, WorkflowConfigError, type WorkflowConfig } from "../../../src/config/workflow-config.js";
import { setTestSink } from "../../../src/utils/telemetry.js";

const providers = [
  { name: "COMMON", url: "http://common.test" },
  { name: "ATLAS", url: "http://atlas.test" },
];

function workflow(stages: WorkflowConfig["stages"], defaultProvider = "COMMON"): WorkflowConfig {
  return { defaultProvider, providers, stages };
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof WorkflowConfigError) return error.issues;
    throw error;
  }
  throw new Error("expected WorkflowConfigError");
}

describe("buildCapabilityRegistry", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("zips a server list against the stage's abilities", () => {
    const registry = buildCapabilityRegistry(
      workflow([
        {
          name: "UNDERSTAND",
          abilities: ["parse_request_text", "extract_entities"],
          binding: ["COMMON", "ATLAS"],
        },
      ]),
    );

    expect(registry.resolve("parse_request_text")).toBe("COMMON");
    expect(registry.resolve("extract_entities")).toBe("ATLAS");
  });

  it("binds every ability of a stage to a single server", () => {
    const registry = buildCapabilityRegistry(
      workflow([{ name: "UPDATE", abilities: ["update_ticket", "close_ticket"], binding: "ATLAS" }]),
    );

    expect(registry.resolve("update_ticket")).toBe("ATLAS");
    expect(registry.resolve("close_ticket")).toBe("ATLAS");
    expect(registry.size).toBe(2);
  });

  it("resolves undeclared abilities to the default provider", () => {
    const registry = buildCapabilityRegistry(
      workflow([{ name: "ASK", abilities: ["clarify_question"], binding: "ATLAS" }], "ATLAS"),
    );

    expect(registry.resolve("never_declared")).toBe("ATLAS");
    expect(registry.size).toBe(1);
  });

  it("lets a later stage override an earlier binding", () => {
    const registry = buildCapabilityRegistry(
      workflow([
        { name: "RETRIEVE", abilities: ["store_data"], binding: "ATLAS" },
        { name: "DECIDE", abilities: ["store_data"], binding: "COMMON" },
      ]),
    );

    expect(registry.resolve("store_data")).toBe("COMMON");
    expect(registry.size).toBe(1);
  });

  it("accepts a server list longer than the abilities", () => {
    const registry = buildCapabilityRegistry(
      workflow([{ name: "ASK", abilities: ["clarify_question"], binding: ["ATLAS", "COMMON"] }]),
    );

    expect(registry.resolve("clarify_question")).toBe("ATLAS");
  });

  it("binds through server when a parsed stage lists no servers", () => {
    const parsed = parseWorkflowConfig(
      {
        servers: { COMMON: { url: "http://common.test" }, ATLAS: { url: "http://atlas.test" } },
        stages: [{ name: "ASK", abilities: ["clarify_question"], servers: [], server: "ATLAS" }],
      },
      {},
    );

    const registry = buildCapabilityRegistry(parsed);

    expect(registry.resolve("clarify_question")).toBe("ATLAS");
  });

  it("lists every provider it can resolve to, default included", () => {
    const registry = buildCapabilityRegistry(
      workflow([{ name: "ASK", abilities: ["clarify_question"], binding: "ATLAS" }]),
    );

    expect(registry.providerIds()).toEqual(["ATLAS", "COMMON"]);
  });

  it("is frozen", () => {
    const registry = buildCapabilityRegistry(workflow([{ name: "INTAKE", abilities: [], binding: "COMMON" }]));
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it("emits a registry-built event", () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));

    buildCapabilityRegistry(workflow([{ name: "ASK", abilities: ["clarify_question"], binding: "ATLAS" }]));

    expect(events).toEqual(["support.registry.built"]);
  });

  it("reports every inconsistent stage at once", () => {
    const issues = issuesOf(() =>
      buildCapabilityRegistry(
        workflow(
          [
            { name: "UNDERSTAND", abilities: ["a", "b", "c"], binding: ["COMMON"] },
            { name: "ASK", abilities: ["clarify_question"], binding: "MISSING" },
            { name: "WAIT", abilities: ["x", "y"], binding: ["ATLAS", "NOPE"] },
            { name: "DO", abilities: ["execute_api_calls"], binding: undefined },
          ],
          "GONE",
        ),
      ),
    );

    expect(issues).toEqual([
      'default server "GONE" is not configured',
      "stage UNDERSTAND: 3 abilities but only 1 servers listed",
      'stage ASK: unknown server "MISSING"',
      'stage WAIT: unknown server(s) "NOPE"',
      "stage DO: no server declared for 1 ability",
    ]);
  });

  it("allows a stage with no abilities and no server", () => {
    const registry = buildCapabilityRegistry(workflow([{ name: "INTAKE", abilities: [], binding: undefined }]));
    expect(registry.size).toBe(0);
  });
});

describe("CapabilityRegistry", () => {
  it("can be built directly from entries", () => {
    const registry = new CapabilityRegistry([["extract_entities", "ATLAS"]], "COMMON");
    expect(registry.resolve("extract_entities")).toBe("ATLAS");
    expect(registry.resolve("parse_request_text")).toBe("COMMON");
  });
});
