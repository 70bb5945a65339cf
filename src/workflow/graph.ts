/**
 * Support workflow graph: a fixed chain with one conditional fork after DECIDE.
 *
 *   INTAKE → UNDERSTAND → PREPARE → ASK → WAIT → RETRIEVE → DECIDE
 *   DECIDE ⇒ UPDATE | CREATE → DO → COMPLETE → END
 */

import { decideRoute } from "./router.js";
import {
  askStage,
  completeStage,
  createStage,
  decideStage,
  doStage,
  intakeStage,
  prepareStage,
  retrieveStage,
  understandStage,
  updateStage,
  waitStage,
} from "./stages/index.js";
import { END, STAGE_NAMES, type StageEdge, type StageName, type WorkflowGraph } from "./types.js";

export class GraphValidationError extends Error {
  readonly name = "GraphValidationError";
}

export function createSupportGraph(): WorkflowGraph {
  return {
    entry: "INTAKE",
    stages: {
      INTAKE: intakeStage,
      UNDERSTAND: understandStage,
      PREPARE: prepareStage,
      ASK: askStage,
      WAIT: waitStage,
      RETRIEVE: retrieveStage,
      DECIDE: decideStage,
      UPDATE: updateStage,
      CREATE: createStage,
      DO: doStage,
      COMPLETE: completeStage,
    },
    edges: {
      INTAKE: { kind: "direct", to: "UNDERSTAND" },
      UNDERSTAND: { kind: "direct", to: "PREPARE" },
      PREPARE: { kind: "direct", to: "ASK" },
      ASK: { kind: "direct", to: "WAIT" },
      WAIT: { kind: "direct", to: "RETRIEVE" },
      RETRIEVE: { kind: "direct", to: "DECIDE" },
      DECIDE: {
        kind: "conditional",
        select: decideRoute,
        targets: { UPDATE: "UPDATE", CREATE: "CREATE" },
      },
      UPDATE: { kind: "direct", to: "DO" },
      CREATE: { kind: "direct", to: "DO" },
      DO: { kind: "direct", to: "COMPLETE" },
      COMPLETE: { kind: "direct", to: END },
    },
  };
}

function successors(edge: StageEdge): string[] {
  return edge.kind === "direct" ? [edge.to] : Object.values(edge.targets);
}

/**
 * Check the entry exists, every edge points at a known stage or END,
 * and the stage graph has no cycle.
 *
 * @throws GraphValidationError on the first problem found
 */
export function validateGraph(graph: WorkflowGraph): void {
  const known = new Set<string>(Object.keys(graph.stages));

  if (!known.has(graph.entry)) {
    throw new GraphValidationError(`entry stage ${graph.entry} has no handler`);
  }

  for (const name of STAGE_NAMES) {
    for (const target of successors(graph.edges[name])) {
      if (target !== END && !known.has(target)) {
        throw new GraphValidationError(`stage ${name} points at unknown stage ${target}`);
      }
    }
  }

  const temp = new Set<string>();
  const perm = new Set<string>();
  const visit = (n: StageName): boolean => {
    if (perm.has(n)) return true;
    if (temp.has(n)) return false;
    temp.add(n);
    for (const m of successors(graph.edges[n])) {
      if (m !== END && isStageName(m) && !visit(m)) return false;
    }
    temp.delete(n);
    perm.add(n);
    return true;
  };

  if (!STAGE_NAMES.every((n) => visit(n))) {
    throw new GraphValidationError("stage graph contains a cycle");
  }
}

function isStageName(value: string): value is StageName {
  return (STAGE_NAMES as readonly string[]).includes(value);
}
