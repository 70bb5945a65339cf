/**
 * Router
 *
 * Runs once, after DECIDE. Picks the branch from `solution_score` and
 * performs the escalation bookkeeping for that branch. Unlike stages, the
 * router merges its ability results straight into the state.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { RequestState } from "./state.js";
import type { AbilityCaller, RouteBranch } from "./types.js";

export const CREATE_SCORE_THRESHOLD = 90;

/** Pure branch choice: below the threshold updates the ticket, otherwise drafts a reply. */
export function selectBranch(score: number): RouteBranch {
  return score < CREATE_SCORE_THRESHOLD ? "UPDATE" : "CREATE";
}

export async function decideRoute(state: RequestState, abilities: AbilityCaller): Promise<RouteBranch> {
  const score = state.get("solution_score") ?? 0;
  const branch = selectBranch(score);

  if (branch === "UPDATE") {
    state.merge(await abilities.call("escalation_decision", {}, state));
    state.merge(await abilities.call("update_payload", {}, state));
    state.log(`Router: score ${score} < ${CREATE_SCORE_THRESHOLD} → UPDATE.`);
  } else {
    state.merge({ escalated: false });
    state.merge(await abilities.call("update_payload", {}, state));
    state.log(`Router: score ${score} ≥ ${CREATE_SCORE_THRESHOLD} → CREATE.`);
  }

  emit(TelemetryEvents.RouteSelected, { run_id: state.runId, score, branch });
  return branch;
}
