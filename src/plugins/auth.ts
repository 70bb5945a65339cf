/**
 * API Key Authentication
 *
 * Keys come from SUPPORT_API_KEYS (comma-separated). With no keys
 * configured, auth is disabled. A key is accepted from either
 * X-Support-Api-Key or Authorization: Bearer <key>.
 *
 * Public routes: /healthz, /health
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { config } from "../config/index.js";
import { buildErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { emit, TelemetryEvents, log } from "../utils/telemetry.js";

export const API_KEY_HEADER = "x-support-api-key";

/**
 * Read through the lazy config on each call so tests can change keys
 */
function getValidApiKeys(): Set<string> {
  return new Set(config.auth.supportApiKeys ?? []);
}

function isPublicRoute(path: string): boolean {
  const publicRoutes = ["/healthz", "/health"];
  const pathname = path.split("?")[0];
  return publicRoutes.includes(pathname);
}

function extractApiKey(request: FastifyRequest): string | null {
  const header = request.headers[API_KEY_HEADER];
  if (typeof header === "string" && header.length > 0) {
    return header;
  }

  const authHeader = request.headers["authorization"];
  if (typeof authHeader === "string" && authHeader.startsWith("Bearer ")) {
    return authHeader.substring(7);
  }

  return null;
}

async function authPluginImpl(fastify: FastifyInstance) {
  const initialKeys = getValidApiKeys();
  if (initialKeys.size === 0) {
    log.warn("No API keys configured (SUPPORT_API_KEYS). Auth disabled.");
  } else {
    // Only log the count
    log.info({ count: initialKeys.size }, "API keys configured");
  }

  fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    if (isPublicRoute(request.url)) {
      return;
    }

    const validKeys = getValidApiKeys();
    if (validKeys.size === 0) {
      return;
    }

    const apiKey = extractApiKey(request);
    if (!apiKey) {
      emit(TelemetryEvents.AuthFailed, { reason: "missing_header", path: request.url });
      return reply
        .code(401)
        .send(
          buildErrorV1(
            "UNAUTHENTICATED",
            "Missing API key. Provide X-Support-Api-Key header.",
            undefined,
            getRequestId(request),
          ),
        );
    }

    if (!validKeys.has(apiKey)) {
      emit(TelemetryEvents.AuthFailed, { reason: "invalid_key", path: request.url });
      return reply
        .code(401)
        .send(buildErrorV1("UNAUTHENTICATED", "Invalid API key.", undefined, getRequestId(request)));
    }
  });
}

/**
 * Auth plugin (exported with fastify-plugin to break encapsulation)
 */
export const authPlugin = fp(authPluginImpl, {
  name: "auth",
  fastify: "5.x",
});
