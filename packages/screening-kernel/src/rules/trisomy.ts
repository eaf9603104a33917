import type { ClassificationResult, TestIteration, ThresholdConfigV1 } from "@nipt-console/contracts";

import { trisomyFirstTestThresholds, trisomyRetestThresholds } from "../config/accessor";
import { formatZ, isRetest, makeResult, retestLabel } from "./result";

/**
 * Common trisomy (21 / 18 / 13) classification from a chromosome Z-score.
 *
 * 1st test: two bands (low / ambiguous). 2nd and 3rd tests: four bands
 * (low / medium / high / positive). Every boundary is a strict `<` against the
 * band's lower bound, so a Z-score exactly at a threshold lands in the stricter band.
 */
export function classifyTrisomy(
  cfg: ThresholdConfigV1,
  zScore: number | null | undefined,
  iteration: TestIteration
): ClassificationResult {
  if (zScore === null || zScore === undefined || Number.isNaN(zScore)) {
    return makeResult("Invalid Data", "UNKNOWN", "INVALID");
  }

  if (!isRetest(iteration)) {
    const t = trisomyFirstTestThresholds(cfg);
    if (zScore < t.low) return makeResult("Low Risk", "LOW", "NEGATIVE");
    if (zScore < t.ambiguous) return makeResult(`High Risk (Z:${formatZ(zScore)}) -> Re-library`, "HIGH", "RELIBRARY");
    return makeResult("POSITIVE", "POSITIVE", "POSITIVE");
  }

  const label = retestLabel(iteration);
  const t = trisomyRetestThresholds(cfg, iteration);
  const resample = `High Risk (Z:${formatZ(zScore)}) -> Resample for verification`;

  if (zScore < t.low) return makeResult(`Negative (${label})`, "LOW", "NEGATIVE");
  // medium and high bands share one message.
  if (zScore < t.medium) return makeResult(resample, "HIGH", "RESAMPLE");
  if (zScore < t.high) return makeResult(resample, "HIGH", "RESAMPLE");
  if (zScore < t.positive) {
    return makeResult(`High Risk (Z:${formatZ(zScore)}) -> Report Positive if consistent`, "HIGH", "POSITIVE");
  }
  return makeResult(`POSITIVE (${label})`, "POSITIVE", "POSITIVE");
}
