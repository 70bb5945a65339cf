// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import supportRunRouteV1 from "./routes/support.v1.run.js";
import healthRouteV1 from "./routes/v1.health.js";
import observabilityPlugin from "./plugins/observability.js";
import { authPlugin } from "./plugins/auth.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { ABILITY_TIMEOUT_MS, ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { config, isProduction } from "./config/index.js";
import { loadWorkflowConfig } from "./config/workflow-config.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { createSupportWorkflow, type SupportWorkflow } from "./workflow/index.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins ?? DEFAULT_ORIGINS;

  if (isProduction() && origins.some((origin) => origin === "*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

export interface BuildOptions {
  /** Pre-built workflow; defaults to one built from the workflow YAML file. */
  workflow?: SupportWorkflow;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(opts: BuildOptions = {}) {
  // Fail-fast: in production, auth must not be accidentally disabled
  if (isProduction() && (config.auth.supportApiKeys ?? []).length === 0) {
    throw new Error("FATAL: In production, SUPPORT_API_KEYS must be configured");
  }

  // Configuration errors are fatal before any run starts
  const workflow = opts.workflow ?? createSupportWorkflow(await loadWorkflowConfig());

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: getOrGenerateRequestId,
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: no CSP, cross-origin reads allowed
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  const rateLimitRpm = config.rateLimits.defaultRpm;
  await app.register(rateLimit, {
    global: true,
    max: rateLimitRpm,
    timeWindow: "1 minute",
    addHeadersOnExceeding: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
    },
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: rateLimitRpm, request_id: requestId }, "Rate limit exceeded");

      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  await app.register(observabilityPlugin);

  await app.register(authPlugin);

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, getRequestId(request)));
  });

  await healthRouteV1(app, workflow.registry);
  await supportRunRouteV1(app, workflow.engine);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          workflow_config: config.workflow.configPath,
          rate_limit_rpm: config.rateLimits.defaultRpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: resolveAllowedOrigins(),
          ability_timeout_ms: ABILITY_TIMEOUT_MS,
          route_timeout_ms: ROUTE_TIMEOUT_MS,
        },
        "Support workflow service starting",
      );

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
