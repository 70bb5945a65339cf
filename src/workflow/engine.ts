/**
 * Workflow Engine
 *
 * Drives one run through the support graph. Each stage returns a batched
 * update which is committed after the stage returns; the router is only
 * consulted at the conditional edge. Nothing thrown inside a run escapes:
 * a failing stage is logged and contributes an empty update.
 */

import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { createSupportGraph, validateGraph } from "./graph.js";
import { RequestState, type StateUpdate, type SupportInput } from "./state.js";
import {
  END,
  type AbilityCaller,
  type AbilityInvoker,
  type RouteBranch,
  type StageName,
  type StageEdge,
  type SupportRunResult,
  type WorkflowGraph,
} from "./types.js";

export interface WorkflowEngineOptions {
  /** Defaults to the support graph. */
  graph?: WorkflowGraph;
}

export interface RunOptions {
  /** Correlates provider calls with the caller's request id. */
  runId?: string;
}

export class WorkflowEngine {
  private readonly graph: WorkflowGraph;

  /** @throws GraphValidationError when the graph is malformed */
  constructor(
    private readonly abilities: AbilityInvoker,
    opts: WorkflowEngineOptions = {},
  ) {
    this.graph = opts.graph ?? createSupportGraph();
    validateGraph(this.graph);
  }

  async run(input: SupportInput, opts: RunOptions = {}): Promise<SupportRunResult> {
    const startTime = Date.now();
    const state = new RequestState(input, opts.runId);
    const visited: StageName[] = [];
    let branch: RouteBranch | null = null;
    let failedAbilities = 0;

    // Per-run caller that tallies failed calls for the completion event
    const caller: AbilityCaller = {
      call: async (ability, payload, s) => {
        const outcome = await this.abilities.invoke(ability, payload, s);
        if (outcome.kind === "failed") failedAbilities += 1;
        return outcome.update;
      },
    };

    emit(TelemetryEvents.RunStarted, { run_id: state.runId, ticket_id: input.ticket_id });

    let current: StageName | typeof END = this.graph.entry;
    while (current !== END) {
      const stage: StageName = current;
      visited.push(stage);

      const update = await this.runStage(stage, state, caller);
      state.merge(update);
      emit(TelemetryEvents.StageCompleted, {
        run_id: state.runId,
        stage,
        fields: Object.keys(update),
      });

      const edge: StageEdge = this.graph.edges[stage];
      if (edge.kind === "direct") {
        current = edge.to;
      } else {
        const selected = await this.selectBranch(stage, state, caller, edge.select);
        branch = selected;
        current = edge.targets[selected];
      }
    }

    const snapshot = state.snapshot();
    const durationMs = Date.now() - startTime;

    emit(TelemetryEvents.RunCompleted, {
      run_id: state.runId,
      branch: branch ?? "none",
      stages: visited.length,
      failed_abilities: failedAbilities,
      duration_ms: durationMs,
    });

    return {
      run_id: state.runId,
      state: snapshot,
      output: snapshot.output ?? { ...snapshot },
      logs: [...snapshot.logs],
      branch,
      stages: visited,
      duration_ms: durationMs,
    };
  }

  private async runStage(stage: StageName, state: RequestState, caller: AbilityCaller): Promise<StateUpdate> {
    try {
      return await this.graph.stages[stage](state, caller);
    } catch (error) {
      this.recordStageFailure(stage, state, error);
      return {};
    }
  }

  /** A router that throws falls back to the UPDATE branch. */
  private async selectBranch(
    stage: StageName,
    state: RequestState,
    caller: AbilityCaller,
    select: (state: RequestState, abilities: AbilityCaller) => Promise<RouteBranch>,
  ): Promise<RouteBranch> {
    try {
      return await select(state, caller);
    } catch (error) {
      this.recordStageFailure(stage, state, error);
      return "UPDATE";
    }
  }

  private recordStageFailure(stage: StageName, state: RequestState, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    state.log(`${stage} failed: ${message}`);
    log.error({ run_id: state.runId, stage, error }, "Stage failed, continuing with empty update");
    emit(TelemetryEvents.StageFailed, { run_id: state.runId, stage, error: message });
  }
}
