// packages/contracts/src/schema/registry_v1.ts
//
// Registry records (patients, results, audit) and the request bodies that create them.

import { z } from "zod";

import { DispositionZ, QcStatusZ, SampleInterpretationV1Z } from "./classification_v1";
import { SampleInputV1Z, SampleMetricsV1Z, TestIterationZ, ZScoreSetZ } from "./sample_v1";

const ActorZ = z.string().trim().min(1).max(120);

export const PatientInputV1Z = z
  .object({
    mrn: z.string(),
    full_name: z.string().trim().min(1),
    age: z.number().int(),
    weeks: z.number().int().min(0).max(45).nullable().default(null),
    weight_kg: z.number().positive().nullable().default(null),
    height_cm: z.number().positive().nullable().default(null),
    clinical_notes: z.string().default(""),
  })
  .strict();
export type PatientInputV1 = z.infer<typeof PatientInputV1Z>;

export const PatientV1Z = z
  .object({
    id: z.number().int(),
    mrn: z.string(),
    full_name: z.string(),
    age: z.number().int(),
    weeks: z.number().int().nullable(),
    weight_kg: z.number().nullable(),
    height_cm: z.number().nullable(),
    bmi: z.number().nullable(),
    clinical_notes: z.string(),
    created_at_ts: z.number().int(),
  })
  .strict();
export type PatientV1 = z.infer<typeof PatientV1Z>;

export const QcOverrideInfoV1Z = z
  .object({
    reason: z.string().min(1),
    actor: z.string().min(1),
    at_ts: z.number().int().nonnegative(),
    // Disposition in force when the override was applied; restored when it is removed.
    prior_disposition: DispositionZ,
  })
  .strict();
export type QcOverrideInfoV1 = z.infer<typeof QcOverrideInfoV1Z>;

export const ResultRecordV1Z = z
  .object({
    type: z.literal("result_record_v1"),
    id: z.number().int(),
    patient_id: z.number().int(),
    panel: z.string(),
    test_number: TestIterationZ,
    qc_status: QcStatusZ,
    qc_issues: z.array(z.string()),
    qc_advice: z.string(),
    metrics: SampleMetricsV1Z,
    z_scores: ZScoreSetZ,
    interpretation: SampleInterpretationV1Z,
    disposition: DispositionZ,
    qc_override: QcOverrideInfoV1Z.nullable(),
    created_at_ts: z.number().int(),
    created_by: z.string(),
  })
  .strict();
export type ResultRecordV1 = z.infer<typeof ResultRecordV1Z>;

export const AuditEntryV1Z = z
  .object({
    id: z.number().int(),
    actor: z.string(),
    action: z.string(),
    details: z.string(),
    at_ts: z.number().int(),
  })
  .strict();
export type AuditEntryV1 = z.infer<typeof AuditEntryV1Z>;

export const SaveResultRequestV1Z = z
  .object({
    patient: PatientInputV1Z,
    sample: SampleInputV1Z,
    allow_duplicate: z.boolean().default(true),
    actor: ActorZ,
  })
  .strict();
export type SaveResultRequestV1 = z.infer<typeof SaveResultRequestV1Z>;

// Demographics only; the MRN is the registry key and cannot be changed.
export const PatientUpdateRequestV1Z = z
  .object({
    full_name: z.string().trim().min(1).optional(),
    age: z.number().int().optional(),
    weeks: z.number().int().min(0).max(45).nullable().optional(),
    weight_kg: z.number().positive().nullable().optional(),
    height_cm: z.number().positive().nullable().optional(),
    clinical_notes: z.string().optional(),
    actor: ActorZ,
  })
  .strict();
export type PatientUpdateRequestV1 = z.infer<typeof PatientUpdateRequestV1Z>;

// Re-interprets a stored result from corrected inputs.
export const ResultUpdateRequestV1Z = z
  .object({
    sample: SampleInputV1Z,
    // An active QC override is refused unless the caller asks to drop it.
    clear_override: z.boolean().default(false),
    actor: ActorZ,
  })
  .strict();
export type ResultUpdateRequestV1 = z.infer<typeof ResultUpdateRequestV1Z>;

export const QcOverrideRequestV1Z = z
  .object({
    reason: z.string(),
    actor: ActorZ,
  })
  .strict();
export type QcOverrideRequestV1 = z.infer<typeof QcOverrideRequestV1Z>;

export const ActorRequestV1Z = z.object({ actor: ActorZ }).strict();
