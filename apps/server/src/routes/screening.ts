// apps/server/src/routes/screening.ts
//
// Stateless endpoints: nothing here touches the registry.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { SampleInputV1Z } from "@nipt-console/contracts";
import { DISPOSITION_LABELS, formatOneIn } from "@nipt-console/screening-kernel";

import type { ScreeningRuntime } from "../runtime";

export function registerScreeningRoutes(app: FastifyInstance, runtime: ScreeningRuntime): void {
  // POST /api/screening/interpret
  app.post("/api/screening/interpret", async (req, reply) => {
    const input = SampleInputV1Z.parse(req.body);
    const interpretation = runtime.interpret(input);
    return reply.send({ ok: true, interpretation, disposition_label: DISPOSITION_LABELS[interpretation.disposition] });
  });

  // GET /api/maternal_age_risk?age=
  app.get("/api/maternal_age_risk", async (req, reply) => {
    const { age } = z.object({ age: z.coerce.number().finite().min(0).max(100) }).parse(req.query ?? {});
    const risk = runtime.maternalAgeRisk(age);
    return reply.send({
      ok: true,
      age,
      risk,
      display: { t21: formatOneIn(risk.t21), t18: formatOneIn(risk.t18), t13: formatOneIn(risk.t13) },
    });
  });
}
