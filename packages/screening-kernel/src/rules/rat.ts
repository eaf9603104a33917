import type { ClassificationResult, TestIteration, ThresholdConfigV1 } from "@nipt-console/contracts";

import { ratThresholds } from "../config/accessor";
import { formatZ, isRetest, makeResult, retestLabel } from "./result";

/**
 * Rare autosomal trisomy classification.
 *
 * The low boundary is exclusive on the 1st test (`z > low` is ambiguous) and
 * inclusive on retests (`z <= low` is negative). Keep it that way.
 */
export function classifyRat(cfg: ThresholdConfigV1, zScore: number, iteration: TestIteration): ClassificationResult {
  const t = ratThresholds(cfg, iteration);

  if (!isRetest(iteration)) {
    if (zScore >= t.positive) return makeResult("POSITIVE", "POSITIVE", "POSITIVE");
    if (zScore > t.low) return makeResult("Ambiguous -> Re-library", "HIGH", "RELIBRARY");
    return makeResult("Low Risk", "LOW", "NEGATIVE");
  }

  const label = retestLabel(iteration);
  if (zScore <= t.low) return makeResult(`Negative (${label})`, "LOW", "NEGATIVE");
  if (zScore < t.positive) {
    return makeResult(`High Risk (Z:${formatZ(zScore)}) -> Resample for verification`, "HIGH", "RESAMPLE");
  }
  return makeResult(`POSITIVE (${label})`, "POSITIVE", "POSITIVE");
}
