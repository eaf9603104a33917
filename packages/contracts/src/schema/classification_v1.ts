// packages/contracts/src/schema/classification_v1.ts
//
// Outputs of the screening kernel. These are plain value objects: the registry
// stores them as JSON and re-renders them without re-running analysis.

import { z } from "zod";

import { TestIterationZ } from "./sample_v1";

export const RiskTierZ = z.enum(["LOW", "HIGH", "POSITIVE", "INVALID", "UNKNOWN"]);
export type RiskTier = z.infer<typeof RiskTierZ>;

/**
 * What the result text asks the lab to do with the finding.
 * The reportability gate is driven by this tag, not by re-reading the text.
 */
export const ReportDirectiveZ = z.enum(["RELIBRARY", "RESAMPLE", "AMBIGUOUS", "INVALID", "POSITIVE", "NEGATIVE", "NONE"]);
export type ReportDirective = z.infer<typeof ReportDirectiveZ>;

export const ClassificationResultZ = z
  .object({
    result_text: z.string(),
    risk_tier: RiskTierZ,
    directive: ReportDirectiveZ,
  })
  .strict();
export type ClassificationResult = z.infer<typeof ClassificationResultZ>;

export const QcStatusZ = z.enum(["PASS", "WARNING", "FAIL"]);
export type QcStatus = z.infer<typeof QcStatusZ>;

export const QcOutcomeZ = z
  .object({
    status: QcStatusZ,
    issues: z.array(z.string()), // "HARD: ..." / "SOFT: ..."
    advice: z.string(),
  })
  .strict();
export type QcOutcome = z.infer<typeof QcOutcomeZ>;

export const DispositionZ = z.enum(["NEGATIVE", "HIGH_RISK", "POSITIVE", "INVALID_QC_FAIL"]);
export type Disposition = z.infer<typeof DispositionZ>;

export const ReportabilityZ = z
  .object({
    reportable: z.enum(["Yes", "No"]),
    reason: z.string(),
  })
  .strict();
export type Reportability = z.infer<typeof ReportabilityZ>;

export const CnvFindingZ = z
  .object({
    size_mb: z.number(),
    ratio_pct: z.number(),
    threshold: z.number(),
    result: ClassificationResultZ,
  })
  .strict();
export type CnvFinding = z.infer<typeof CnvFindingZ>;

export const RatFindingZ = z
  .object({
    chromosome: z.number().int(),
    z_score: z.number(),
    result: ClassificationResultZ,
  })
  .strict();
export type RatFinding = z.infer<typeof RatFindingZ>;

export const SampleInterpretationV1Z = z
  .object({
    type: z.literal("sample_interpretation_v1"),
    test_number: TestIterationZ,
    trisomy: z.object({ "21": ClassificationResultZ, "18": ClassificationResultZ, "13": ClassificationResultZ }).strict(),
    sca: ClassificationResultZ,
    cnv: z.array(CnvFindingZ),
    rat: z.array(RatFindingZ),
    qc: QcOutcomeZ,
    is_positive: z.boolean(),
    is_high_risk: z.boolean(),
    disposition: DispositionZ,
    reportability: z
      .object({
        t21: ReportabilityZ,
        t18: ReportabilityZ,
        t13: ReportabilityZ,
        sca: ReportabilityZ,
        cnv: z.array(ReportabilityZ),
        rat: z.array(ReportabilityZ),
      })
      .strict(),
  })
  .strict();
export type SampleInterpretationV1 = z.infer<typeof SampleInterpretationV1Z>;
