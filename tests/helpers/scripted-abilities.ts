/**
 * In-process ability stand-ins for workflow tests.
 */

import type { RequestState, StateUpdate } from "../../src/workflow/state.js";
import type { AbilityInvoker, AbilityOutcome, AbilityPayload, ProviderClient } from "../../src/workflow/types.js";

export const FAIL = Symbol("fail");

export type ScriptedResponse = StateUpdate | typeof FAIL | ((state: RequestState, payload: AbilityPayload) => StateUpdate);

export interface RecordedCall {
  ability: string;
  payload: AbilityPayload;
  /** State as the ability saw it. */
  state: ReturnType<RequestState["snapshot"]>;
}

/**
 * Answers every ability from a table; unlisted abilities answer `{}`.
 * Log lines mirror the HTTP provider client.
 */
export class ScriptedProvider implements ProviderClient, AbilityInvoker {
  readonly calls: RecordedCall[] = [];

  constructor(
    readonly name: string,
    private readonly script: Record<string, ScriptedResponse> = {},
  ) {}

  async invoke(ability: string, payload: AbilityPayload, state: RequestState): Promise<AbilityOutcome> {
    this.calls.push({ ability, payload, state: state.snapshot() });
    const response = this.script[ability] ?? {};

    if (response === FAIL) {
      const reason = "scripted failure";
      state.log(`[${this.name}] ${ability} failed: ${reason}`);
      return { kind: "failed", provider: this.name, ability, reason, update: {}, elapsedMs: 0 };
    }

    const update = typeof response === "function" ? response(state, payload) : response;
    state.log(`[${this.name}] ${ability} → ${JSON.stringify(update)}`);
    return { kind: "success", provider: this.name, ability, update, elapsedMs: 0 };
  }

  async call(ability: string, payload: AbilityPayload, state: RequestState): Promise<StateUpdate> {
    return (await this.invoke(ability, payload, state)).update;
  }

  abilitiesCalled(): string[] {
    return this.calls.map((c) => c.ability);
  }
}
