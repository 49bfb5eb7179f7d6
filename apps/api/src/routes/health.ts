// src/routes/health.ts

import type { FastifyInstance } from "fastify";

import type { SessionRegistry } from "../state/session.registry.js";

export interface HealthRouteOptions {
  registry: SessionRegistry;
}

export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let registryOk = false;
    let latencyMs: number | null = null;

    try {
      await opts.registry.ping();
      registryOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "Registry health check failed");
    }

    return reply.status(registryOk ? 200 : 503).send({
      status: registryOk ? "UP" : "DOWN",
      service: "rangeload-api-v1",
      ready: registryOk,
      timestamp,
      checks: {
        registry: {
          ok: registryOk,
          latencyMs,
          timestamp,
        },
      },
    });
  });
}
