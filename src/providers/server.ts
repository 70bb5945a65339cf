/**
 * Reference ability provider HTTP app
 *
 * POST /abilities/:name  body { payload?, state? } → JSON object
 * GET  /health
 */

import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config/index.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { createLoggerConfig } from "../utils/logger-config.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "../utils/request-id.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { AbilityTable } from "./types.js";

const AbilityRequestSchema = z.object({
  payload: z.record(z.unknown()).default({}),
  state: z.record(z.unknown()).default({}),
});

const AbilityParamsSchema = z.object({ name: z.string().min(1) });

export interface ProviderAppOptions {
  /** Extra fields reported by GET /health. */
  health?: () => Record<string, unknown>;
}

export async function buildProviderApp(
  name: string,
  abilities: AbilityTable,
  opts: ProviderAppOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: getOrGenerateRequestId,
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);
    if (statusCode >= 500) {
      app.log.error({ error, provider: name, url: request.url }, `[${errorV1.code}] ${errorV1.message}`);
    }
    return reply.status(statusCode).send(errorV1);
  });

  app.get("/health", async () => ({
    status: "healthy",
    provider: name,
    timestamp: new Date().toISOString(),
    available_abilities: Object.keys(abilities),
    ...(opts.health ? opts.health() : {}),
  }));

  app.post("/abilities/:name", async (req, reply) => {
    const requestId = getRequestId(req);
    const params = AbilityParamsSchema.parse(req.params);

    const handler = Object.prototype.hasOwnProperty.call(abilities, params.name)
      ? abilities[params.name]
      : undefined;
    if (!handler) {
      reply.code(404);
      return buildErrorV1("NOT_FOUND", `Unknown ability: ${params.name}`, { provider: name }, requestId);
    }

    const body = AbilityRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      reply.code(400);
      return zodErrorToErrorV1(body.error, requestId);
    }

    const startTime = Date.now();
    const result = await handler(body.data);
    emit(TelemetryEvents.ProviderAbilityServed, {
      provider: name,
      ability: params.name,
      request_id: requestId,
      elapsed_ms: Date.now() - startTime,
    });
    return result;
  });

  return app;
}
