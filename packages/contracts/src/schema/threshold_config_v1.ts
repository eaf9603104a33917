// packages/contracts/src/schema/threshold_config_v1.ts
//
// ThresholdConfigV1: the screening thresholds snapshot (SSOT: config/screening/default.json).
// Every nested key is optional here; the kernel's config accessor is the only place
// that knows the default decision table.

import { z } from "zod";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/);

const FiniteZ = z.number().finite();

export const QcThresholdsV1Z = z
  .object({
    min_cff: FiniteZ,
    max_cff: FiniteZ,
    gc_range: z.tuple([FiniteZ, FiniteZ]),
    min_unique_rate: FiniteZ,
    max_error_rate: FiniteZ,
    qs_limit_negative: FiniteZ,
    qs_limit_positive: FiniteZ,
  })
  .partial()
  .strict();

export const TrisomyFirstTestZ = z.object({ low: FiniteZ, ambiguous: FiniteZ }).partial().strict();

export const TrisomyRetestZ = z
  .object({ low: FiniteZ, medium: FiniteZ, high: FiniteZ, positive: FiniteZ })
  .partial()
  .strict();

export const ScaThresholdsZ = z.object({ xx_threshold: FiniteZ, xy_threshold: FiniteZ }).partial().strict();

export const RatThresholdsZ = z.object({ low: FiniteZ, positive: FiniteZ }).partial().strict();

// Keys are the size bands in Mb; values are ratio thresholds in percent.
export const CnvThresholdsZ = z
  .object({ ">=10": FiniteZ, ">7": FiniteZ, ">3.5": FiniteZ, "<=3.5": FiniteZ })
  .partial()
  .strict();

function perIteration<F extends z.ZodTypeAny, R extends z.ZodTypeAny>(first: F, retest: R) {
  return z.object({ "1": first, "2": retest, "3": retest }).partial().strict();
}

export const ThresholdConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    qc: QcThresholdsV1Z.optional(),
    panel_read_limits: z.record(z.string().min(1), FiniteZ).optional(),
    thresholds: z
      .object({
        trisomy: perIteration(TrisomyFirstTestZ, TrisomyRetestZ),
        sca: perIteration(ScaThresholdsZ, ScaThresholdsZ),
        rat: perIteration(RatThresholdsZ, RatThresholdsZ),
        cnv: perIteration(CnvThresholdsZ, CnvThresholdsZ),
      })
      .partial()
      .strict()
      .optional(),
    registry: z.object({ allow_alphanumeric_mrn: z.boolean() }).partial().strict().optional(),
  })
  .strict();

export type ThresholdConfigV1 = z.infer<typeof ThresholdConfigV1Z>;
export type CnvBand = keyof z.infer<typeof CnvThresholdsZ>;

export function parseThresholdConfigV1(input: unknown): ThresholdConfigV1 {
  return ThresholdConfigV1Z.parse(input);
}
