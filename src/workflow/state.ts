/**
 * Request State
 *
 * The single record threaded through one workflow run. Keys are enumerated:
 * caller-supplied input fields, stage-derived fields, and the append-only
 * `logs` list. Provider responses cross into the state only through
 * `sanitizeUpdate`, which drops unknown keys, input-field writes, `logs`
 * writes and values of the wrong type.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";

// ============================================================================
// Schemas
// ============================================================================

const JsonRecord = z.record(z.unknown());

export const SupportInputSchema = z.object({
  customer_name: z.string().optional(),
  email: z.string().optional(),
  query: z.string().optional(),
  priority: z.string().optional(),
  ticket_id: z.string().optional(),
  clarification_answer: z.string().optional(),
});

export type SupportInput = z.infer<typeof SupportInputSchema>;

export const INPUT_FIELDS = [
  "customer_name",
  "email",
  "query",
  "priority",
  "ticket_id",
  "clarification_answer",
] as const satisfies ReadonlyArray<keyof SupportInput>;

export type InputField = (typeof INPUT_FIELDS)[number];

/**
 * Derived fields, one schema per key. A value failing its schema is treated
 * as "no update" for that key.
 */
export const DerivedFieldsSchema = z.object({
  parsed: JsonRecord,
  entities: JsonRecord,
  intent: z.string(),
  confidence: z.number(),
  sentiment: z.string(),
  raw_response: z.string(),
  normalized: JsonRecord,
  enriched: JsonRecord,
  flags: JsonRecord,
  customer_history: z.array(JsonRecord),
  clarification_question: z.string(),
  extracted_info: z.string(),
  kb_results: z.array(JsonRecord),
  solution_score: z.number(),
  escalated: z.boolean(),
  escalation_reason: z.string(),
  decision_notes: z.string(),
  ticket_updates: JsonRecord,
  closed: z.boolean(),
  reason: z.string(),
  status: z.string(),
  updated_at: z.string(),
  stored: z.boolean(),
  draft_response: z.string(),
  generated_at: z.string(),
  ai_response: z.string(),
  api_actions: z.array(z.string()),
  notifications: z.array(z.string()),
  log_stored: z.boolean(),
  conversation_id: z.string(),
  output: JsonRecord,
  error: z.string(),
});

export type DerivedFields = z.infer<typeof DerivedFieldsSchema>;
export type DerivedField = keyof DerivedFields;

/** A partial state update produced by an ability call, a stage or the router. */
export type StateUpdate = Partial<DerivedFields>;

export type SupportState = SupportInput & StateUpdate & { logs: string[] };

const DERIVED_FIELD_SCHEMAS: Record<string, z.ZodTypeAny> = DerivedFieldsSchema.shape;

function isDerivedField(key: string): key is DerivedField {
  return Object.prototype.hasOwnProperty.call(DERIVED_FIELD_SCHEMAS, key);
}

function isInputField(key: string): key is InputField {
  return (INPUT_FIELDS as readonly string[]).includes(key);
}

// ============================================================================
// Write boundary
// ============================================================================

export interface DroppedField {
  key: string;
  reason: "unknown_field" | "input_field" | "logs_field" | "invalid_type";
}

export interface SanitizedUpdate {
  update: StateUpdate;
  dropped: DroppedField[];
}

/**
 * Convert a raw provider response into a typed partial update.
 * `null` values are treated as absent.
 */
export function sanitizeUpdate(raw: Record<string, unknown>): SanitizedUpdate {
  const update: Record<string, unknown> = {};
  const dropped: DroppedField[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (key === "logs") {
      dropped.push({ key, reason: "logs_field" });
      continue;
    }
    if (isInputField(key)) {
      dropped.push({ key, reason: "input_field" });
      continue;
    }
    if (!isDerivedField(key)) {
      dropped.push({ key, reason: "unknown_field" });
      continue;
    }
    if (value === null || value === undefined) {
      continue;
    }
    const parsed = DERIVED_FIELD_SCHEMAS[key].safeParse(value);
    if (!parsed.success) {
      dropped.push({ key, reason: "invalid_type" });
      continue;
    }
    update[key] = parsed.data;
  }

  // Every key in `update` has been validated against its DerivedFields schema
  return { update: DerivedFieldsSchema.partial().parse(update), dropped };
}

export function isEmptyUpdate(update: StateUpdate): boolean {
  return Object.keys(update).length === 0;
}

// ============================================================================
// RequestState
// ============================================================================

/**
 * Mutable per-run state. One instance per run, never shared across runs.
 */
export class RequestState {
  readonly runId: string;
  private readonly values: SupportState;

  constructor(input: SupportInput, runId: string = randomUUID()) {
    const fields = SupportInputSchema.parse(input);
    this.runId = runId;
    this.values = { ...fields, logs: [] };
  }

  get<K extends keyof SupportState>(key: K): SupportState[K] {
    return this.values[key];
  }

  get logs(): readonly string[] {
    return this.values.logs;
  }

  /** Append one line to the diagnostic log. */
  log(message: string): void {
    this.values.logs.push(message);
  }

  /**
   * Merge a partial update: union of keys, new values win.
   * Derived fields are only ever overwritten, never removed.
   */
  merge(update: StateUpdate): void {
    Object.assign(this.values, update);
  }

  /** Deep copy of the current state, safe to serialize or hand to a provider. */
  snapshot(): SupportState {
    return structuredClone(this.values);
  }
}
