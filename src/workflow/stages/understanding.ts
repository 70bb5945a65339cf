import { isEmptyUpdate, type RequestState, type StateUpdate } from "../state.js";
import type { AbilityCaller } from "../types.js";

/**
 * UNDERSTAND: parse, extract entities, extract intent, score sentiment.
 *
 * All four calls see the state as it was when the stage started; their
 * results are batched and committed by the engine after the stage returns.
 * TODO: sentiment_analysis could take the freshly extracted intent if the
 * batch were merged incrementally; kept batched until providers rely on it.
 */
export async function understandStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const parsed = await abilities.call("parse_request_text", {}, state);
  const entities = await abilities.call("extract_entities", {}, state);
  const intent = await abilities.call("extract_intent", {}, state);
  const sentiment = await abilities.call("sentiment_analysis", {}, state);

  state.log("UNDERSTAND complete.");
  return { ...parsed, ...entities, ...intent, ...sentiment };
}

/**
 * PREPARE: normalize inputs, enrich the customer record, compute flags,
 * then pull the customer's support history when the store has any.
 */
export async function prepareStage(state: RequestState, abilities: AbilityCaller): Promise<StateUpdate> {
  const update: StateUpdate = {
    ...(await abilities.call("normalize_fields", {}, state)),
    ...(await abilities.call("enrich_records", {}, state)),
    ...(await abilities.call("add_flags_calculations", {}, state)),
  };

  const history = await abilities.call("get_customer_history", {}, state);
  if (!isEmptyUpdate(history)) {
    Object.assign(update, history);
  }

  state.log("PREPARE complete.");
  return update;
}
