/**
 * Support workflow composition root: registry, provider clients,
 * dispatcher and engine, each built once and shared across runs.
 */

import type { WorkflowConfig } from "../config/workflow-config.js";
import { buildCapabilityRegistry, type CapabilityRegistry } from "./capability-registry.js";
import { AbilityDispatcher } from "./dispatcher.js";
import { WorkflowEngine } from "./engine.js";
import { HttpProviderClient } from "./provider-client.js";
import type { ProviderClient } from "./types.js";

export interface SupportWorkflowOptions {
  /** Per-call timeout handed to every HTTP provider client. */
  timeoutMs?: number;
  /** Replace the HTTP clients, e.g. with in-process providers. */
  clients?: ProviderClient[];
}

export interface SupportWorkflow {
  registry: CapabilityRegistry;
  dispatcher: AbilityDispatcher;
  engine: WorkflowEngine;
}

export function createSupportWorkflow(
  workflow: WorkflowConfig,
  opts: SupportWorkflowOptions = {},
): SupportWorkflow {
  const registry = buildCapabilityRegistry(workflow);
  const clients =
    opts.clients ??
    workflow.providers.map(
      (provider) =>
        new HttpProviderClient({
          name: provider.name,
          baseUrl: provider.url,
          apiKey: provider.apiKey,
          timeoutMs: opts.timeoutMs,
        }),
    );
  const dispatcher = new AbilityDispatcher(registry, clients);
  const engine = new WorkflowEngine(dispatcher);
  return { registry, dispatcher, engine };
}

export { WorkflowEngine } from "./engine.js";
export { RequestState, sanitizeUpdate, SupportInputSchema } from "./state.js";
export type { SupportInput, SupportState, StateUpdate } from "./state.js";
export type { SupportRunResult, RouteBranch, StageName } from "./types.js";
