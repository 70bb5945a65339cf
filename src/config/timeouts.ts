import { env } from "node:process";

const MIN_TIMEOUT_MS = 1_000; // 1s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

export function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Per-call bound for a single ability RPC. */
export const ABILITY_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ABILITY_TIMEOUT_MS", 30_000),
);

/** Bound for a single language-model completion inside the reference provider. */
export const LLM_COMPLETION_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("LLM_COMPLETION_TIMEOUT_MS", 20_000),
);

export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 120_000),
);
