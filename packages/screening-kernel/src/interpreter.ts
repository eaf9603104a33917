// Screening Kernel - sample interpretation entrypoint (v1)
//
// Pure function: config snapshot + one sample in, one SampleInterpretationV1 out.
// No IO. The four condition classifiers and QC are independent of each other;
// the only coupling is the screen polarity fed into QC.

import type {
  ClassificationResult,
  CnvFinding,
  Disposition,
  QcStatus,
  RatFinding,
  SampleInputV1,
  SampleInterpretationV1,
  ThresholdConfigV1,
} from "@nipt-console/contracts";

import { classifyCnv } from "./rules/cnv";
import { evaluateQc } from "./rules/qc";
import { classifyRat } from "./rules/rat";
import { classifySca } from "./rules/sca";
import { classifyTrisomy } from "./rules/trisomy";
import { gateFindings } from "./reportability";

export const DISPOSITION_LABELS: Readonly<Record<Disposition, string>> = Object.freeze({
  NEGATIVE: "NEGATIVE",
  HIGH_RISK: "HIGH RISK (SEE ADVICE)",
  POSITIVE: "POSITIVE DETECTED",
  INVALID_QC_FAIL: "INVALID (QC FAIL)",
});

export function deriveDisposition(isPositive: boolean, isHighRisk: boolean, qcStatus: QcStatus): Disposition {
  if (qcStatus === "FAIL") return "INVALID_QC_FAIL";
  if (isPositive) return "POSITIVE";
  return isHighRisk ? "HIGH_RISK" : "NEGATIVE";
}

/**
 * Interprets one sample.
 *
 * Findings are computed even when QC fails, so a later override can reveal them.
 * Any CNV or RAT finding on the sample counts towards high risk, whatever its tier.
 */
export function interpretSample(cfg: ThresholdConfigV1, input: SampleInputV1): SampleInterpretationV1 {
  const it = input.test_number;
  const z = input.z_scores;

  const trisomy = {
    "21": classifyTrisomy(cfg, z["21"], it),
    "18": classifyTrisomy(cfg, z["18"], it),
    "13": classifyTrisomy(cfg, z["13"], it),
  };
  const sca = classifySca(cfg, input.sca_type, z.XX ?? Number.NaN, z.XY ?? Number.NaN, input.metrics.cff, it);

  const cnv: CnvFinding[] = input.cnv.map((c) => {
    const { result, threshold } = classifyCnv(c.size_mb, c.ratio_pct, it, cfg);
    return { size_mb: c.size_mb, ratio_pct: c.ratio_pct, threshold, result };
  });
  const rat: RatFinding[] = input.rat.map((r) => ({
    chromosome: r.chromosome,
    z_score: r.z_score,
    result: classifyRat(cfg, r.z_score, it),
  }));

  const main: ClassificationResult[] = [trisomy["21"], trisomy["18"], trisomy["13"], sca];
  const findingTiers = [...cnv, ...rat].map((f) => f.result.risk_tier);

  const is_positive = main.some((r) => r.risk_tier === "POSITIVE");
  const is_high_risk =
    main.some((r) => r.risk_tier === "HIGH") ||
    findingTiers.some((tier) => tier === "HIGH" || tier === "POSITIVE") ||
    cnv.length > 0 ||
    rat.length > 0;

  const qc = evaluateQc(cfg, input.metrics, is_positive || is_high_risk);

  return Object.freeze({
    type: "sample_interpretation_v1" as const,
    test_number: it,
    trisomy,
    sca,
    cnv,
    rat,
    qc,
    is_positive,
    is_high_risk,
    disposition: deriveDisposition(is_positive, is_high_risk, qc.status),
    reportability: gateFindings({ trisomy, sca, cnv, rat }, qc.status, false),
  });
}
