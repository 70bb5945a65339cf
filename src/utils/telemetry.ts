import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * to ensure both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST is set.
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  RunStarted: "support.run.started",
  RunCompleted: "support.run.completed",
  StageCompleted: "support.stage.completed",
  StageFailed: "support.stage.failed",
  AbilitySucceeded: "support.ability.succeeded",
  AbilityFailed: "support.ability.failed",
  StateFieldsDropped: "support.state.fields_dropped",
  RouteSelected: "support.route.selected",
  RegistryBuilt: "support.registry.built",
  ProviderAbilityServed: "provider.ability.served",
  ProviderLlmFallback: "provider.llm.fallback",
  AuthFailed: "http.auth.failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "support.workflow.",
    globalTags: {
      service: env.DD_SERVICE || "support-workflow-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
export type Event = Record<string, unknown>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      // Nested arrays are flattened out of telemetry payloads
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, v] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(v);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryValue | undefined): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : "unknown";
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.RunCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("run.duration_ms", eventData.duration_ms, {
            branch: tag(eventData.branch),
          });
        }
        if (typeof eventData.failed_abilities === "number") {
          datadogClient.gauge("run.failed_abilities", eventData.failed_abilities);
        }
        datadogClient.increment("run.completed", 1, { branch: tag(eventData.branch) });
        break;
      }

      case TelemetryEvents.AbilityFailed: {
        datadogClient.increment("ability.failed", 1, {
          provider: tag(eventData.provider),
          ability: tag(eventData.ability),
        });
        break;
      }

      case TelemetryEvents.AbilitySucceeded: {
        if (typeof eventData.elapsed_ms === "number") {
          datadogClient.histogram("ability.latency_ms", eventData.elapsed_ms, {
            provider: tag(eventData.provider),
            ability: tag(eventData.ability),
          });
        }
        break;
      }

      case TelemetryEvents.RouteSelected: {
        datadogClient.increment("route.selected", 1, { branch: tag(eventData.branch) });
        break;
      }

      case TelemetryEvents.StageFailed: {
        datadogClient.increment("stage.failed", 1, { stage: tag(eventData.stage) });
        break;
      }

      default:
        break;
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to send telemetry metric");
  }
}
