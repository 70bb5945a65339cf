import type { RequestState, StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

/** ASK: produce a clarification question for the customer. */
export async function askStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const update = await abilities.call("clarify_question", {}, state);
  state.log("ASK complete.");
  return update;
}

/** WAIT: extract and store the customer's clarification answer. */
export async function waitStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const extracted = await abilities.call("extract_answer", {}, state);
  const stored = await abilities.call("store_answer", {}, state);

  state.log("WAIT complete.");
  return { ...extracted, ...stored };
}
