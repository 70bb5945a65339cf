import type { RequestState, StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

/**
 * INTAKE: acknowledge the request with the intake provider.
 * The acknowledgement is not merged; the stage contributes nothing but a log line.
 */
export async function intakeStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  await abilities.call("accept_payload", {}, state);
  state.log("INTAKE complete.");
  return {};
}
