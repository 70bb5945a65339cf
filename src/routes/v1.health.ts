import type { FastifyInstance } from "fastify";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";
import type { CapabilityRegistry } from "../workflow/capability-registry.js";

export default async function route(app: FastifyInstance, registry: CapabilityRegistry) {
  app.get("/healthz", async (_req, reply) => {
    reply.code(200);
    return {
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      providers: registry.providerIds(),
      default_provider: registry.defaultProvider,
      abilities: registry.size,
    };
  });
}
