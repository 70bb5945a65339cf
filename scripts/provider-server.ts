#!/usr/bin/env node
/**
 * Reference ability provider
 *
 * Usage:
 *   tsx scripts/provider-server.ts common [--port 8001]
 *   tsx scripts/provider-server.ts atlas  [--port 8002] [--in-memory-store]
 */

import "dotenv/config";

import { config } from "../src/config/index.js";
import { createDataStoreAbilities } from "../src/providers/data-store/abilities.js";
import { loadInMemorySupportStore, type SupportStore } from "../src/providers/data-store/store.js";
import { createOpenAICompletion } from "../src/providers/language-model/completion.js";
import { createLanguageModelAbilities } from "../src/providers/language-model/abilities.js";
import { buildProviderApp } from "../src/providers/server.js";
import type { AbilityTable } from "../src/providers/types.js";

const DEFAULT_PORTS = { common: 8001, atlas: 8002 } as const;

export type ProviderKind = keyof typeof DEFAULT_PORTS;

export interface ProviderServerOptions {
  kind: ProviderKind;
  port: number;
  inMemoryStore: boolean;
}

function isProviderKind(value: string): value is ProviderKind {
  return value === "common" || value === "atlas";
}

export function parseArgs(argv: string[]): ProviderServerOptions {
  const [kindArg, ...rest] = argv;
  if (!kindArg || !isProviderKind(kindArg)) {
    throw new Error(`Expected provider kind "common" or "atlas", got ${kindArg ?? "nothing"}`);
  }

  let port: number = config.providers.port ?? DEFAULT_PORTS[kindArg];
  let inMemoryStore = config.providers.useInMemoryStore;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--port") {
      const value = Number(rest[++i]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error("--port requires a positive integer");
      }
      port = value;
    } else if (arg === "--in-memory-store") {
      inMemoryStore = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { kind: kindArg, port, inMemoryStore };
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));

  let abilities: AbilityTable;
  let health: () => Record<string, unknown>;

  if (opts.kind === "common") {
    const complete = createOpenAICompletion();
    abilities = createLanguageModelAbilities({ complete });
    health = () => ({ llm_configured: complete !== undefined });
  } else {
    const store: SupportStore | undefined = opts.inMemoryStore
      ? await loadInMemorySupportStore(config.providers.seedPath)
      : undefined;
    abilities = createDataStoreAbilities({ store });
    health = () => ({ store_status: store ? "in_memory" : "none" });
  }

  const name = opts.kind.toUpperCase();
  const app = await buildProviderApp(name, abilities, { health });
  await app.listen({ port: opts.port, host: "0.0.0.0" });
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error("Failed to start provider:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
