import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { env } from "node:process";
import { getRequestId } from "../utils/request-id.js";

/**
 * Observability Plugin
 *
 * Request completion logging with sampling (INFO_SAMPLE_RATE, default 0.1).
 * Errors are always logged. Customer fields are redacted by the logger config.
 */

const INFO_SAMPLE_RATE = Number(env.INFO_SAMPLE_RATE) || 0.1;

/**
 * Always log errors (4xx, 5xx), sample successful requests.
 */
function shouldSampleInfoLog(statusCode: number): boolean {
  if (statusCode >= 400) return true;
  return Math.random() < INFO_SAMPLE_RATE;
}

async function observabilityPlugin(fastify: FastifyInstance) {
  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    if (!shouldSampleInfoLog(statusCode)) {
      return;
    }

    const logData = {
      request_id: getRequestId(request),
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: Math.round(reply.elapsedTime),
      user_agent: request.headers["user-agent"],
    };

    if (statusCode >= 500) {
      fastify.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(logData, "Request completed with client error");
    } else {
      fastify.log.info(logData, "Request completed");
    }
  });

  fastify.addHook("onError", async (request: FastifyRequest, reply: FastifyReply, error: Error) => {
    fastify.log.error(
      {
        request_id: getRequestId(request),
        method: request.method,
        url: request.url,
        duration_ms: Math.round(reply.elapsedTime),
        error: {
          name: error.name,
          message: error.message,
          ...(env.LOG_STACK === "1" ? { stack: error.stack } : {}),
        },
      },
      "Request error",
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});
