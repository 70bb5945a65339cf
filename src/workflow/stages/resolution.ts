import type { RequestState, StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

export const RESPONSE_SYSTEM_MESSAGE =
  "You are a professional customer support agent. Generate a helpful, empathetic response.";

/**
 * UPDATE (low-score branch): update and close the ticket, record its status.
 * `store_ticket` is fire-and-forget; its result is discarded.
 */
export async function updateStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const ticket = await abilities.call("update_ticket", {}, state);
  const closure = await abilities.call("close_ticket", {}, state);
  const status = await abilities.call("update_ticket_status", {}, state);

  await abilities.call("store_ticket", {}, state);

  state.log("UPDATE complete.");
  return { ...ticket, ...closure, ...status };
}

/**
 * CREATE (high-score branch): draft a response, then ask the richer
 * generator. Its draft replaces the first one whenever it is non-empty.
 */
export async function createStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const update: StateUpdate = { ...(await abilities.call("response_generation", {}, state)) };

  const enhanced = await abilities.call(
    "generate_response",
    { system_message: RESPONSE_SYSTEM_MESSAGE },
    state,
  );
  if (enhanced.draft_response) {
    update.draft_response = enhanced.draft_response;
  }

  state.log("CREATE complete.");
  return update;
}
