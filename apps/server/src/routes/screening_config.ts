// apps/server/src/routes/screening_config.ts
//
// Screening config manifest + patch endpoint (manifest v1).
//
// The backend is the only authority for:
// - ssot_hash computation
// - editable allowlist exposure
// - patch static validation / refusal

import type { FastifyInstance } from "fastify";

import type { ScreeningRuntime } from "../runtime";

export function registerScreeningConfigRoutes(app: FastifyInstance, runtime: ScreeningRuntime): void {
  // GET /api/screening/config
  // Active config fingerprint + editable manifest.
  app.get("/api/screening/config", async (_req, reply) => {
    return reply.send({ ...runtime.getManifest(), config: runtime.config() });
  });

  // POST /api/screening/config/patch
  // Previews (dryRun, the default) or commits a replace-only patch as a new config revision.
  app.post("/api/screening/config/patch", async (req, reply) => {
    return reply.send(runtime.patchConfig(req.body ?? {}));
  });
}
