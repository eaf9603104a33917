// apps/server/src/routes/results.ts
//
// Registry CRUD and the staff QC override.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import {
  ActorRequestV1Z,
  PatientUpdateRequestV1Z,
  QcOverrideRequestV1Z,
  ResultUpdateRequestV1Z,
  SaveResultRequestV1Z,
} from "@nipt-console/contracts";

import type { ScreeningRuntime } from "../runtime";
import { IdParamsZ, LimitQueryZ } from "./params";

const ListResultsQueryZ = LimitQueryZ.extend({ patient_id: z.coerce.number().int().positive().optional() });

export function registerResultRoutes(app: FastifyInstance, runtime: ScreeningRuntime): void {
  app.post("/api/results", async (req, reply) => {
    const body = SaveResultRequestV1Z.parse(req.body);
    const { patient, view } = runtime.saveResult(body);
    return reply.code(201).send({ ok: true, patient, ...view });
  });

  app.get("/api/results", async (req, reply) => {
    const q = ListResultsQueryZ.parse(req.query ?? {});
    return reply.send({ ok: true, results: runtime.listResults({ limit: q.limit, patient_id: q.patient_id }) });
  });

  app.get("/api/results/:id", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    return reply.send({ ok: true, ...runtime.getResult(id) });
  });

  app.put("/api/results/:id", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const body = ResultUpdateRequestV1Z.parse(req.body);
    return reply.send({ ok: true, ...runtime.updateResult(id, body) });
  });

  app.delete("/api/results/:id", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const { actor } = ActorRequestV1Z.parse(req.body);
    runtime.deleteResult(id, actor);
    return reply.send({ ok: true, deleted_result_id: id });
  });

  app.patch("/api/patients/:id", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const body = PatientUpdateRequestV1Z.parse(req.body);
    return reply.send({ ok: true, patient: runtime.updatePatient(id, body) });
  });

  app.delete("/api/patients/:id", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const { actor } = ActorRequestV1Z.parse(req.body);
    const { result_count } = runtime.deletePatient(id, actor);
    return reply.send({ ok: true, deleted_patient_id: id, deleted_result_count: result_count });
  });

  // QC override: apply / inspect / remove.
  app.post("/api/results/:id/qc_override", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const body = QcOverrideRequestV1Z.parse(req.body);
    return reply.send({ ok: true, ...runtime.applyQcOverride(id, body) });
  });

  app.get("/api/results/:id/qc_override", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    return reply.send({ ok: true, qc_override: runtime.qcOverrideInfo(id) });
  });

  app.delete("/api/results/:id/qc_override", async (req, reply) => {
    const { id } = IdParamsZ.parse(req.params);
    const { actor } = ActorRequestV1Z.parse(req.body);
    return reply.send({ ok: true, ...runtime.removeQcOverride(id, actor) });
  });
}
