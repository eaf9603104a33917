import type { FastifyInstance } from "fastify";

import type { ScreeningRuntime } from "../runtime";
import { clampLimit } from "./params";

export function registerRegistryRoutes(app: FastifyInstance, runtime: ScreeningRuntime): void {
  app.get("/api/analytics/summary", async (_req, reply) => {
    return reply.send({ ok: true, summary: runtime.analytics() });
  });

  app.get("/api/audit", async (req, reply) => {
    return reply.send({ ok: true, entries: runtime.audit(clampLimit(req.query)) });
  });
}
