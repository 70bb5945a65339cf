/**
 * Capability Registry
 *
 * Immutable ability → provider table, built once at start-up from the
 * workflow configuration. Unknown abilities resolve to the default provider.
 *
 * Binding rules per stage:
 * - a single provider id binds every ability of the stage to it
 * - a list of provider ids is zipped against the abilities
 * - a later stage declaring the same ability wins
 */

import { WorkflowConfigError, type StageBinding, type WorkflowConfig } from "../config/workflow-config.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

export class CapabilityRegistry {
  private readonly table: ReadonlyMap<string, string>;

  constructor(
    entries: Iterable<readonly [string, string]>,
    readonly defaultProvider: string,
  ) {
    this.table = new Map(entries);
    Object.freeze(this);
  }

  /** Provider id serving `ability`, or the default provider when undeclared. */
  resolve(ability: string): string {
    return this.table.get(ability) ?? this.defaultProvider;
  }

  /** Every provider id the registry can resolve to, default included. */
  providerIds(): string[] {
    return [...new Set([...this.table.values(), this.defaultProvider])];
  }

  get size(): number {
    return this.table.size;
  }
}

function bindStage(stage: StageBinding, known: ReadonlySet<string>, issues: string[]): Array<[string, string]> {
  const { name, abilities, binding } = stage;

  if (binding === undefined) {
    if (abilities.length > 0) {
      issues.push(`stage ${name}: no server declared for ${abilities.length} abilit${abilities.length === 1 ? "y" : "ies"}`);
    }
    return [];
  }

  if (typeof binding === "string") {
    if (!known.has(binding)) {
      issues.push(`stage ${name}: unknown server "${binding}"`);
      return [];
    }
    return abilities.map((ability): [string, string] => [ability, binding]);
  }

  if (binding.length < abilities.length) {
    issues.push(
      `stage ${name}: ${abilities.length} abilities but only ${binding.length} servers listed`,
    );
    return [];
  }

  const unknown = binding.filter((server) => !known.has(server));
  if (unknown.length > 0) {
    issues.push(`stage ${name}: unknown server(s) ${unknown.map((s) => `"${s}"`).join(", ")}`);
    return [];
  }

  return abilities.map((ability, i): [string, string] => [ability, binding[i]]);
}

/**
 * Build the registry, failing fast on any inconsistent stage declaration.
 *
 * @throws WorkflowConfigError listing every problem found
 */
export function buildCapabilityRegistry(workflow: WorkflowConfig): CapabilityRegistry {
  const known = new Set(workflow.providers.map((p) => p.name));
  const issues: string[] = [];

  if (!known.has(workflow.defaultProvider)) {
    issues.push(`default server "${workflow.defaultProvider}" is not configured`);
  }

  const entries: Array<[string, string]> = [];
  for (const stage of workflow.stages) {
    entries.push(...bindStage(stage, known, issues));
  }

  if (issues.length > 0) {
    throw new WorkflowConfigError("Inconsistent ability bindings", issues);
  }

  // Map construction keeps the last write per ability
  const registry = new CapabilityRegistry(entries, workflow.defaultProvider);

  emit(TelemetryEvents.RegistryBuilt, {
    abilities: registry.size,
    providers: registry.providerIds(),
    default_provider: registry.defaultProvider,
  });

  return registry;
}
