/**
 * Support data store
 *
 * Persistence behind the data-store provider: customers, tickets,
 * knowledge-base articles and conversation logs. `InMemorySupportStore`
 * is the bundled implementation, seeded from a JSON file.
 */

import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { z } from "zod";

export const CustomerRecordSchema = z.object({
  email: z.string(),
  name: z.string().optional(),
  tier: z.string().default("standard"),
  account_age_days: z.number().int().nonnegative().default(0),
  total_orders: z.number().int().nonnegative().default(0),
  last_contact: z.string().optional(),
  created_at: z.string().optional(),
});

export type CustomerRecord = z.infer<typeof CustomerRecordSchema>;

export const KnowledgeArticleSchema = z.object({
  article_id: z.string(),
  title: z.string(),
  content: z.string(),
});

export type KnowledgeArticle = z.infer<typeof KnowledgeArticleSchema>;

export const TicketRecordSchema = z.object({
  ticket_id: z.string(),
  customer_name: z.string().optional(),
  customer_email: z.string().optional(),
  query: z.string().optional(),
  priority: z.string().optional(),
  intent: z.string().optional(),
  sentiment: z.string().optional(),
  status: z.string().optional(),
  escalated: z.boolean().optional(),
  issue_summary: z.string().optional(),
  resolution: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type TicketRecord = z.infer<typeof TicketRecordSchema>;

export interface ConversationLogRecord {
  ticket_id?: string;
  conversation_log: string[];
  final_state: Record<string, unknown>;
  timestamp: string;
}

export const SeedFileSchema = z.object({
  customers: z.array(CustomerRecordSchema).default([]),
  tickets: z.array(TicketRecordSchema).default([]),
  articles: z.array(KnowledgeArticleSchema).default([]),
});

export type SeedFile = z.infer<typeof SeedFileSchema>;

export interface SupportStore {
  findCustomer(email: string): Promise<CustomerRecord | undefined>;
  insertCustomer(customer: CustomerRecord): Promise<void>;
  /** Most recent first. */
  recentTickets(email: string, limit: number): Promise<TicketRecord[]>;
  upsertTicket(ticketId: string, fields: Partial<TicketRecord>): Promise<void>;
  insertTicket(ticket: TicketRecord): Promise<void>;
  searchArticles(terms: string, limit: number): Promise<KnowledgeArticle[]>;
  /** Returns the stored log's id. */
  insertConversationLog(entry: ConversationLogRecord): Promise<string>;
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 2);
}

export class InMemorySupportStore implements SupportStore {
  private readonly customers = new Map<string, CustomerRecord>();
  private tickets: TicketRecord[] = [];
  private readonly articles: KnowledgeArticle[] = [];
  private readonly conversationLogs = new Map<string, ConversationLogRecord>();

  constructor(seed: Partial<SeedFile> = {}) {
    for (const customer of seed.customers ?? []) {
      this.customers.set(customer.email.toLowerCase(), customer);
    }
    this.tickets = [...(seed.tickets ?? [])];
    this.articles.push(...(seed.articles ?? []));
  }

  async findCustomer(email: string): Promise<CustomerRecord | undefined> {
    return this.customers.get(email.toLowerCase());
  }

  async insertCustomer(customer: CustomerRecord): Promise<void> {
    const key = customer.email.toLowerCase();
    if (this.customers.has(key)) {
      throw new Error(`customer ${key} already exists`);
    }
    this.customers.set(key, customer);
  }

  async recentTickets(email: string, limit: number): Promise<TicketRecord[]> {
    const key = email.toLowerCase();
    return this.tickets
      .filter((ticket) => ticket.customer_email?.toLowerCase() === key)
      .sort((a, b) => (b.created_at ?? "").localeCompare(a.created_at ?? ""))
      .slice(0, limit);
  }

  async upsertTicket(ticketId: string, fields: Partial<TicketRecord>): Promise<void> {
    const index = this.tickets.findIndex((ticket) => ticket.ticket_id === ticketId);
    if (index === -1) {
      this.tickets.push({ ...fields, ticket_id: ticketId });
      return;
    }
    this.tickets[index] = { ...this.tickets[index], ...fields, ticket_id: ticketId };
  }

  async insertTicket(ticket: TicketRecord): Promise<void> {
    this.tickets.push({ ...ticket });
  }

  /**
   * Ranks articles by how many distinct query words appear in the title or
   * content; articles matching no word are left out.
   */
  async searchArticles(terms: string, limit: number): Promise<KnowledgeArticle[]> {
    const words = [...new Set(tokenize(terms))];
    if (words.length === 0) return [];

    return this.articles
      .map((article) => {
        const haystack = new Set(tokenize(`${article.title} ${article.content}`));
        return { article, hits: words.filter((word) => haystack.has(word)).length };
      })
      .filter(({ hits }) => hits > 0)
      .sort((a, b) => b.hits - a.hits)
      .slice(0, limit)
      .map(({ article }) => article);
  }

  async insertConversationLog(entry: ConversationLogRecord): Promise<string> {
    const id = randomUUID();
    this.conversationLogs.set(id, structuredClone(entry));
    return id;
  }

  ticketCount(): number {
    return this.tickets.length;
  }

  conversationLog(id: string): ConversationLogRecord | undefined {
    return this.conversationLogs.get(id);
  }
}

/** Read and validate a seed file, then build an in-memory store from it. */
export async function loadInMemorySupportStore(path: string): Promise<InMemorySupportStore> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  return new InMemorySupportStore(SeedFileSchema.parse(raw));
}
