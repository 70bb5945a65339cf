import type { RequestState, StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

/**
 * DO: run downstream actions and notifications.
 * `store_conversation_log` is fire-and-forget; its result is discarded.
 */
export async function doStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const actions = await abilities.call("execute_api_calls", {}, state);
  const notifications = await abilities.call("trigger_notifications", {}, state);

  await abilities.call("store_conversation_log", {}, state);

  state.log("DO complete.");
  return { ...actions, ...notifications };
}

/** COMPLETE: fetch the caller-facing output payload. Terminal stage. */
export async function completeStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const output = await abilities.call("output_payload", {}, state);
  state.log("COMPLETE done.");
  return output;
}
