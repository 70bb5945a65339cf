/**
 * Language-model provider (COMMON)
 *
 * Text understanding, scoring and response drafting. `extract_intent`,
 * `sentiment_analysis` and `generate_response` use a chat model when one is
 * configured and keyword rules otherwise; a failed model call answers with
 * the keyword result plus an `error` field.
 */

import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import { isPresent } from "../../utils/is-present.js";
import { StateView } from "../state-view.js";
import type { AbilityRequest, AbilityResponse, AbilityTable } from "../types.js";
import type { CompletionFn } from "./completion.js";

export const DEFAULT_RESPONSE_SYSTEM_MESSAGE =
  "You are a professional customer support agent. Generate a helpful, empathetic response to the customer query based on the provided context. Be concise but warm.";

const INTENT_SYSTEM_MESSAGE = `Analyze the customer query and extract the primary intent. Choose from:
- refund_request
- replacement_request
- order_status
- technical_support
- account_issue
- general_inquiry
- complaint
- compliment

Respond with only the intent name and confidence score (0-1) separated by a space.`;

const SENTIMENT_SYSTEM_MESSAGE =
  "Analyze the sentiment of the following customer support query. Respond with only: positive, negative, or neutral, followed by a confidence score from 0-1.";

const NEGATIVE_WORDS = ["angry", "frustrated", "terrible", "awful", "hate", "worst", "useless"];
const POSITIVE_WORDS = ["great", "excellent", "love", "amazing", "perfect", "thank", "wonderful"];

const BASE_SCORE = 80;
const KB_BONUS = 10;
const CLARIFICATION_BONUS = 5;

export function classifyIntent(query: string): { intent: string; confidence: number } {
  const q = query.toLowerCase();
  if (q.includes("refund")) {
    return { intent: "refund_request", confidence: 0.8 };
  }
  if (q.includes("replacement") || q.includes("replace")) {
    return { intent: "replacement_request", confidence: 0.8 };
  }
  if (q.includes("order") && (q.includes("status") || q.includes("track"))) {
    return { intent: "order_status", confidence: 0.8 };
  }
  return { intent: "general_inquiry", confidence: 0.5 };
}

/** Counts listed words appearing anywhere in the query (substring match). */
export function classifySentiment(query: string): { sentiment: string; confidence: number } {
  const q = query.toLowerCase();
  const negative = NEGATIVE_WORDS.filter((word) => q.includes(word)).length;
  const positive = POSITIVE_WORDS.filter((word) => q.includes(word)).length;

  if (negative > positive) return { sentiment: "negative", confidence: 0.7 };
  if (positive > negative) return { sentiment: "positive", confidence: 0.7 };
  return { sentiment: "neutral", confidence: 0.6 };
}

/**
 * Parse "<label> <score>" model output. A score that is not a plain
 * decimal falls back to 0.5.
 */
export function parseLabelAndScore(text: string, defaultLabel: string): { label: string; score: number; raw: string } {
  const raw = text.trim().toLowerCase();
  const [label, score] = raw.split(/\s+/);
  return {
    label: label || defaultLabel,
    score: score !== undefined && /^\d*\.?\d+$/.test(score) ? Number(score) : 0.5,
    raw,
  };
}

function fallbackDraft(name: string, escalated: boolean): string {
  return escalated
    ? `Hi ${name}, we've escalated your issue to a specialist who will contact you shortly.`
    : `Hi ${name}, thank you for contacting us. We're processing your request and will get back to you soon.`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function recordFallback(ability: string, error: unknown): string {
  const message = describe(error);
  emit(TelemetryEvents.ProviderLlmFallback, { ability, error: message });
  return message;
}

export interface LanguageModelAbilityOptions {
  /** Chat model; omitted means keyword fallbacks only. */
  complete?: CompletionFn;
}

export function createLanguageModelAbilities(opts: LanguageModelAbilityOptions = {}): AbilityTable {
  const { complete } = opts;

  return {
    accept_payload: async () => ({ accepted: true }),

    parse_request_text: async ({ state }: AbilityRequest): Promise<AbilityResponse> => {
      const query = new StateView(state).string("query");
      return {
        parsed: {
          intent: query.toLowerCase().includes("damaged") ? "issue_report" : "general_query",
          mentioned_order_ids: query.split(/\s+/).filter((token) => token.startsWith("#")),
        },
      };
    },

    normalize_fields: async ({ state }) => {
      const view = new StateView(state);
      return {
        normalized: {
          email: view.string("email").toLowerCase().trim(),
          priority: view.string("priority", "medium").toLowerCase(),
        },
      };
    },

    add_flags_calculations: async ({ state }) => {
      const priority = new StateView(state).string("priority", "medium").toLowerCase();
      return { flags: { sla_risk: priority === "high" ? 2 : 1 } };
    },

    solution_evaluation: async ({ state }) => {
      const view = new StateView(state);
      let score = BASE_SCORE;
      if (view.has("kb_results")) score += KB_BONUS;
      if (view.has("clarification_answer")) score += CLARIFICATION_BONUS;
      return { solution_score: Math.min(score, 100) };
    },

    update_payload: async ({ state }) => {
      const view = new StateView(state);
      return {
        decision_notes: `Score=${view.number("solution_score")}; escalated=${view.flag("escalated")}`,
      };
    },

    store_answer: async ({ state }) => ({
      clarification_answer: state.clarification_answer ?? null,
    }),

    store_data: async ({ state }) => ({
      kb_results: new StateView(state).list("kb_results"),
    }),

    response_generation: async ({ state }) => {
      const view = new StateView(state);
      const name = view.string("customer_name", "Customer");
      return {
        draft_response: view.flag("escalated")
          ? `Hi ${name}, we've escalated your issue to a specialist.`
          : `Hi ${name}, your request is being processed.`,
      };
    },

    output_payload: async ({ state }) => ({ output: state }),

    extract_intent: async ({ state }) => {
      const query = new StateView(state).string("query");
      if (!complete) {
        return classifyIntent(query);
      }
      if (!query) {
        return { intent: "unknown", confidence: 0 };
      }
      try {
        const text = await complete({
          system: INTENT_SYSTEM_MESSAGE,
          user: query,
          maxTokens: 50,
          temperature: 0.3,
        });
        const { label, score, raw } = parseLabelAndScore(text, "general_inquiry");
        return { intent: label, confidence: score, raw_response: raw };
      } catch (error) {
        return { ...classifyIntent(query), error: recordFallback("extract_intent", error) };
      }
    },

    sentiment_analysis: async ({ state }) => {
      const query = new StateView(state).string("query");
      if (!complete) {
        return classifySentiment(query);
      }
      if (!query) {
        return { sentiment: "neutral", confidence: 0 };
      }
      try {
        const text = await complete({
          system: SENTIMENT_SYSTEM_MESSAGE,
          user: query,
          maxTokens: 50,
          temperature: 0.3,
        });
        const { label, score, raw } = parseLabelAndScore(text, "neutral");
        return { sentiment: label, confidence: score, raw_response: raw };
      } catch (error) {
        return { ...classifySentiment(query), error: recordFallback("sentiment_analysis", error) };
      }
    },

    generate_response: async ({ payload, state }) => {
      const view = new StateView(state);
      const name = view.string("customer_name", "Customer");
      if (!complete) {
        return { draft_response: fallbackDraft(name, view.flag("escalated")) };
      }

      const context = [
        `Customer: ${name}`,
        `Query: ${view.string("query")}`,
        `Entities: ${JSON.stringify(view.record("entities"))}`,
        `Knowledge Base Results: ${JSON.stringify(view.list("kb_results"))}`,
      ].join("\n");
      const system =
        typeof payload.system_message === "string" && isPresent(payload.system_message)
          ? payload.system_message
          : DEFAULT_RESPONSE_SYSTEM_MESSAGE;

      try {
        const text = await complete({
          system,
          user: `Context:\n${context}\n\nGenerate a response:`,
          maxTokens: 300,
          temperature: 0.7,
        });
        return { draft_response: text, generated_at: new Date().toISOString() };
      } catch (error) {
        return {
          draft_response: fallbackDraft(name, view.flag("escalated")),
          error: recordFallback("generate_response", error),
        };
      }
    },
  };
}

export const LANGUAGE_MODEL_ABILITIES = Object.keys(createLanguageModelAbilities());
