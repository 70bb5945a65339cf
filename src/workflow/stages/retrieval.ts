import type { RequestState, StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

/**
 * RETRIEVE: query both knowledge-base searches and store the results.
 * Both searches write `kb_results`; the second one wins.
 */
export async function retrieveStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const primary = await abilities.call("knowledge_base_search", {}, state);
  const secondary = await abilities.call("search_knowledge_base", {}, state);
  const stored = await abilities.call("store_data", {}, state);

  state.log("RETRIEVE complete.");
  return { ...primary, ...secondary, ...stored };
}

/** DECIDE: score the candidate solution (nominally 0–100, not enforced here). */
export async function decideStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const update = await abilities.call("solution_evaluation", {}, state);
  state.log("DECIDE scored solution.");
  return update;
}
