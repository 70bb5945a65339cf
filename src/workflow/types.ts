/**
 * Workflow Types
 *
 * Shared contracts between the registry, provider clients, dispatcher,
 * stages, router and engine.
 */

import type { RequestState, StateUpdate, SupportState } from "./state.js";

// ============================================================================
// Stages & branches
// ============================================================================

export const STAGE_NAMES = [
  "INTAKE",
  "UNDERSTAND",
  "PREPARE",
  "ASK",
  "WAIT",
  "RETRIEVE",
  "DECIDE",
  "UPDATE",
  "CREATE",
  "DO",
  "COMPLETE",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Terminal marker in the edge table. */
export const END = "__end__" as const;
export type End = typeof END;

export type RouteBranch = "UPDATE" | "CREATE";

// ============================================================================
// Ability calls
// ============================================================================

export type AbilityPayload = Record<string, unknown>;

/**
 * Outcome of one ability call. A failed call still carries an (empty)
 * update so callers can merge without branching.
 */
export type AbilityOutcome =
  | { kind: "success"; provider: string; ability: string; update: StateUpdate; elapsedMs: number }
  | { kind: "failed"; provider: string; ability: string; reason: string; update: StateUpdate; elapsedMs: number };

export interface ProviderClient {
  /** Provider identifier, e.g. "COMMON". */
  readonly name: string;
  /** Never throws; failures resolve to `{ kind: "failed" }` with an empty update. */
  invoke(ability: string, payload: AbilityPayload, state: RequestState): Promise<AbilityOutcome>;
}

/** Outcome-level view of ability calls; the engine tallies failures through it. */
export interface AbilityInvoker {
  invoke(ability: string, payload: AbilityPayload, state: RequestState): Promise<AbilityOutcome>;
}

export interface AbilityCaller {
  call(ability: string, payload: AbilityPayload, state: RequestState): Promise<StateUpdate>;
}

// ============================================================================
// Graph
// ============================================================================

export type StageHandler = (state: RequestState, abilities: AbilityCaller) => Promise<StateUpdate>;

export type BranchSelector = (state: RequestState, abilities: AbilityCaller) => Promise<RouteBranch>;

export type StageEdge =
  | { kind: "direct"; to: StageName | End }
  | { kind: "conditional"; select: BranchSelector; targets: Record<RouteBranch, StageName> };

export interface WorkflowGraph {
  entry: StageName;
  stages: Record<StageName, StageHandler>;
  edges: Record<StageName, StageEdge>;
}

// ============================================================================
// Run result
// ============================================================================

export interface SupportRunResult {
  run_id: string;
  /** Final merged state. */
  state: SupportState;
  /** Output of the terminal stage when it produced one, otherwise the final state. */
  output: Record<string, unknown>;
  logs: string[];
  branch: RouteBranch | null;
  /** Stages in the order they ran. */
  stages: StageName[];
  duration_ms: number;
}
