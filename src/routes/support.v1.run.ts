import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { log } from "../utils/telemetry.js";
import type { WorkflowEngine } from "../workflow/engine.js";

export const SupportRunRequestSchema = z
  .object({
    customer_name: z.string(),
    email: z.string(),
    query: z.string().trim().min(1, "query must not be empty"),
    priority: z.string(),
    ticket_id: z.string(),
    clarification_answer: z.string().optional(),
  })
  .strict();

export type SupportRunRequest = z.infer<typeof SupportRunRequestSchema>;

export default async function route(app: FastifyInstance, engine: WorkflowEngine) {
  app.post("/v1/support/runs", async (req, reply) => {
    const requestId = getRequestId(req);

    if (req.body === undefined || req.body === null) {
      reply.code(400);
      return buildErrorV1("BAD_INPUT", "Request body is required", undefined, requestId);
    }

    const parsed = SupportRunRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return zodErrorToErrorV1(parsed.error, requestId);
    }

    const result = await engine.run(parsed.data, { runId: requestId });

    log.info(
      {
        request_id: requestId,
        ticket_id: parsed.data.ticket_id,
        branch: result.branch,
        duration_ms: result.duration_ms,
      },
      "Support run completed",
    );

    reply.code(200);
    return result;
  });
}
