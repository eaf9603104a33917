// apps/server/src/errors.ts
//
// Every rejection leaves the service as { ok: false, errors: [{ code, path, message }] }.

import type { FastifyInstance } from "fastify";
import { ZodError } from "zod";

import { ScreeningConfigPatchRejected } from "./config/patch";

export type ScreeningErrorCode =
  | "RESULT_NOT_FOUND"
  | "PATIENT_NOT_FOUND"
  | "DUPLICATE_PATIENT"
  | "INVALID_MRN"
  | "INPUT_OUT_OF_RANGE"
  | "OVERRIDE_REASON_REQUIRED"
  | "OVERRIDE_ALREADY_APPLIED"
  | "OVERRIDE_NOT_APPLIED"
  | "RESULT_OVERRIDE_ACTIVE";

const STATUS: Record<ScreeningErrorCode, number> = {
  RESULT_NOT_FOUND: 404,
  PATIENT_NOT_FOUND: 404,
  DUPLICATE_PATIENT: 409,
  INVALID_MRN: 400,
  INPUT_OUT_OF_RANGE: 400,
  OVERRIDE_REASON_REQUIRED: 400,
  OVERRIDE_ALREADY_APPLIED: 409,
  OVERRIDE_NOT_APPLIED: 409,
  RESULT_OVERRIDE_ACTIVE: 409,
};

export type ErrorItem = { code: string; path: string; message: string };

export class ScreeningError extends Error {
  public readonly status: number;
  public readonly code: ScreeningErrorCode;
  public readonly details: string[];

  constructor(code: ScreeningErrorCode, message: string, details: string[] = []) {
    super(`${code}: ${message}`);
    this.name = "ScreeningError";
    this.code = code;
    this.status = STATUS[code];
    this.details = details;
  }
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      const errors: ErrorItem[] = err.issues.map((i) => ({ code: i.code, path: i.path.join("."), message: i.message }));
      return reply.code(400).send({ ok: false, errors });
    }

    if (err instanceof ScreeningError) {
      const message = err.message.slice(err.code.length + 2);
      const errors: ErrorItem[] = err.details.length
        ? err.details.map((d) => ({ code: err.code, path: "", message: d }))
        : [{ code: err.code, path: "", message }];
      return reply.code(err.status).send({ ok: false, errors });
    }

    if (err instanceof ScreeningConfigPatchRejected) {
      return reply.code(err.status).send({ ok: false, ssot_hash: err.ssot_hash, errors: err.errors });
    }

    // Fastify's own 4xx (malformed JSON, unsupported media type, body too large).
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ ok: false, errors: [{ code: err.code, path: "", message: err.message }] });
    }

    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ ok: false, errors: [{ code: "INTERNAL_ERROR", path: "", message: "internal error" }] });
  });
}
