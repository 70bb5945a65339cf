/**
 * Ability Dispatcher
 *
 * One-hop indirection: resolve the owning provider through the registry,
 * invoke that provider's client. No retries, no caching.
 */

import type { CapabilityRegistry } from "./capability-registry.js";
import { WorkflowConfigError } from "../config/workflow-config.js";
import type { RequestState, StateUpdate } from "./state.js";
import type { AbilityCaller, AbilityInvoker, AbilityOutcome, AbilityPayload, ProviderClient } from "./types.js";

export class AbilityDispatcher implements AbilityCaller, AbilityInvoker {
  private readonly clients: ReadonlyMap<string, ProviderClient>;

  /**
   * @throws WorkflowConfigError when the registry can resolve to a provider
   * that has no client
   */
  constructor(
    private readonly registry: CapabilityRegistry,
    clients: Iterable<ProviderClient>,
  ) {
    this.clients = new Map([...clients].map((client) => [client.name, client]));

    const missing = registry.providerIds().filter((id) => !this.clients.has(id));
    if (missing.length > 0) {
      throw new WorkflowConfigError("No client configured for provider(s)", missing);
    }
  }

  async invoke(ability: string, payload: AbilityPayload, state: RequestState): Promise<AbilityOutcome> {
    const providerId = this.registry.resolve(ability);
    const client = this.clients.get(providerId);
    if (!client) {
      // Unreachable after construction-time validation
      const reason = `no client for provider ${providerId}`;
      state.log(`[${providerId}] ${ability} failed: ${reason}`);
      return { kind: "failed", provider: providerId, ability, reason, update: {}, elapsedMs: 0 };
    }
    return client.invoke(ability, payload, state);
  }

  async call(ability: string, payload: AbilityPayload, state: RequestState): Promise<StateUpdate> {
    const outcome = await this.invoke(ability, payload, state);
    return outcome.update;
  }
}
