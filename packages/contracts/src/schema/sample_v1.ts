// packages/contracts/src/schema/sample_v1.ts
import { z } from "zod";

/**
 * Ordinal re-run of a sample: 1st test, or a 2nd/3rd test after an ambiguous or failed result.
 */
export const TestIterationZ = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export type TestIteration = z.infer<typeof TestIterationZ>;

export const SampleMetricsV1Z = z
  .object({
    panel: z.string().min(1),
    reads: z.number().finite(), // millions
    cff: z.number().finite(), // fetal fraction, %
    gc: z.number().finite(), // %
    qs: z.number().finite(), // quality score
    unique_rate: z.number().finite(), // %
    error_rate: z.number().finite(), // %
  })
  .strict();
export type SampleMetricsV1 = z.infer<typeof SampleMetricsV1Z>;

// Keyed by "21" / "18" / "13", any autosome "1".."22", and "XX" / "XY". Sparse.
export const ZScoreSetZ = z.record(z.string().regex(/^([1-9]|1\d|2[0-2]|XX|XY)$/), z.number().finite());

export const CnvInputZ = z
  .object({
    size_mb: z.number().finite(),
    ratio_pct: z.number().finite(),
  })
  .strict();

export const RatInputZ = z
  .object({
    chromosome: z.number().int().min(1).max(22),
    z_score: z.number().finite(),
  })
  .strict();

export const SampleInputV1Z = z
  .object({
    metrics: SampleMetricsV1Z,
    z_scores: ZScoreSetZ,
    // Unrecognized karyotypes are allowed through; the classifier reports them as ambiguous.
    sca_type: z.string().min(1),
    cnv: z.array(CnvInputZ).default([]),
    rat: z.array(RatInputZ).default([]),
    test_number: TestIterationZ.default(1),
  })
  .strict();
export type SampleInputV1 = z.infer<typeof SampleInputV1Z>;
