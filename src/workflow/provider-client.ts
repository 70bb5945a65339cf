/**
 * Provider Client
 *
 * HTTP client for one capability provider: fetch with an AbortController
 * and a bounded timeout. An ability call never throws; every failure becomes
 * `{ kind: "failed" }` with an empty update and a line in the run's log.
 *
 * Endpoint:
 * - POST <baseUrl>/abilities/<ability>  body { payload, state }
 *
 * Auth: when an API key is configured, attaches Authorization: Bearer <key>.
 *
 * Failure taxonomy (all recovered locally):
 * - network error / timeout
 * - non-2xx status
 * - body that is not JSON, or JSON that is not an object
 */

import { ABILITY_TIMEOUT_MS } from "../config/timeouts.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { sanitizeUpdate, type RequestState } from "./state.js";
import type { AbilityOutcome, AbilityPayload, ProviderClient } from "./types.js";

export interface HttpProviderClientOptions {
  name: string;
  baseUrl: string;
  apiKey?: string;
  /** Per-call timeout; defaults to ABILITY_TIMEOUT_MS. */
  timeoutMs?: number;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class HttpProviderClient implements ProviderClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(opts: HttpProviderClientOptions) {
    this.name = opts.name;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? ABILITY_TIMEOUT_MS;
  }

  async invoke(ability: string, payload: AbilityPayload, state: RequestState): Promise<AbilityOutcome> {
    const url = `${this.baseUrl}/abilities/${encodeURIComponent(ability)}`;
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    log.debug(
      { provider: this.name, ability, run_id: state.runId, timeout_ms: this.timeoutMs },
      "Ability request",
    );

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: this.buildHeaders(state.runId),
        body: JSON.stringify({ payload, state: state.snapshot() }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const preview = await response.text().catch(() => "");
        const detail = preview ? `: ${preview.slice(0, 200)}` : "";
        return this.fail(ability, state, `HTTP ${response.status}${detail}`, startTime);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        return this.fail(ability, state, "malformed response body (not JSON)", startTime);
      }

      if (!isJsonObject(body)) {
        return this.fail(ability, state, "malformed response body (expected a JSON object)", startTime);
      }

      const elapsedMs = Date.now() - startTime;
      state.log(`[${this.name}] ${ability} → ${JSON.stringify(body)}`);

      const { update, dropped } = sanitizeUpdate(body);
      if (dropped.length > 0) {
        const names = dropped.map((d) => `${d.key} (${d.reason})`).join(", ");
        state.log(`[${this.name}] ${ability} ignored fields: ${names}`);
        emit(TelemetryEvents.StateFieldsDropped, {
          provider: this.name,
          ability,
          run_id: state.runId,
          fields: dropped.map((d) => d.key),
        });
      }

      emit(TelemetryEvents.AbilitySucceeded, {
        provider: this.name,
        ability,
        run_id: state.runId,
        elapsed_ms: elapsedMs,
      });

      return { kind: "success", provider: this.name, ability, update, elapsedMs };
    } catch (error) {
      if (controller.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
        return this.fail(ability, state, `timed out after ${this.timeoutMs}ms`, startTime);
      }
      return this.fail(ability, state, describeError(error), startTime);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private fail(ability: string, state: RequestState, reason: string, startTime: number): AbilityOutcome {
    const elapsedMs = Date.now() - startTime;
    state.log(`[${this.name}] ${ability} failed: ${reason}`);

    log.warn(
      { provider: this.name, ability, run_id: state.runId, elapsed_ms: elapsedMs, reason },
      "Ability call failed, continuing with empty update",
    );
    emit(TelemetryEvents.AbilityFailed, {
      provider: this.name,
      ability,
      run_id: state.runId,
      elapsed_ms: elapsedMs,
      reason,
    });

    return { kind: "failed", provider: this.name, ability, reason, update: {}, elapsedMs };
  }

  private buildHeaders(runId: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "X-Request-Id": runId,
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
