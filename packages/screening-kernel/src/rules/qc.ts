import type { QcOutcome, QcStatus, SampleMetricsV1, ThresholdConfigV1 } from "@nipt-console/contracts";

import { panelMinReads, qcThresholds } from "../config/accessor";

/**
 * Sequencing QC against panel- and polarity-dependent limits.
 *
 * HARD issues fail the sample and carry remediation advice; SOFT issues only
 * warn. Screen-positive / high-risk samples tolerate a higher quality-score
 * ceiling, so the caller passes that polarity in.
 */
export function evaluateQc(cfg: ThresholdConfigV1, metrics: SampleMetricsV1, isPositiveOrHighRisk: boolean): QcOutcome {
  const t = qcThresholds(cfg);
  const issues: string[] = [];
  const advice: string[] = [];

  const minReads = panelMinReads(cfg, metrics.panel);
  if (metrics.reads < minReads) {
    issues.push(`HARD: Reads ${metrics.reads}M < ${minReads}M`);
    advice.push("Resequencing");
  }

  if (metrics.cff < t.min_cff) {
    issues.push(`HARD: Cff ${metrics.cff}% < ${t.min_cff}%`);
    advice.push("Resample");
  }
  if (metrics.cff > t.max_cff) {
    issues.push(`HARD: Cff ${metrics.cff}% > ${t.max_cff}%`);
    advice.push("Resample");
  }

  const [gcMin, gcMax] = t.gc_range;
  if (!(gcMin <= metrics.gc && metrics.gc <= gcMax)) {
    issues.push(`HARD: GC ${metrics.gc}% out of range`);
    advice.push("Re-library");
  }

  const qsLimit = isPositiveOrHighRisk ? t.qs_limit_positive : t.qs_limit_negative;
  if (metrics.qs >= qsLimit) {
    issues.push(`HARD: QS ${metrics.qs} >= ${qsLimit}`);
    advice.push("Re-library");
  }

  if (metrics.unique_rate < t.min_unique_rate) issues.push(`SOFT: UniqueRate ${metrics.unique_rate}% Low`);
  if (metrics.error_rate > t.max_error_rate) issues.push(`SOFT: ErrorRate ${metrics.error_rate}% High`);

  const status: QcStatus = issues.some((i) => i.startsWith("HARD")) ? "FAIL" : issues.length ? "WARNING" : "PASS";
  const uniqueAdvice = Array.from(new Set(advice));

  return Object.freeze({
    status,
    issues,
    advice: uniqueAdvice.length ? uniqueAdvice.join(" / ") : "None",
  });
}
