import type { ClassificationResult, CnvBand, TestIteration, ThresholdConfigV1 } from "@nipt-console/contracts";

import { cnvThresholds } from "../config/accessor";
import { isRetest, makeResult, retestLabel } from "./result";

export type CnvClassification = {
  result: ClassificationResult;
  band: CnvBand;
  threshold: number;
};

/**
 * Size band for a CNV, first match wins.
 */
export function cnvBand(sizeMb: number): CnvBand {
  if (sizeMb >= 10) return ">=10";
  if (sizeMb > 7) return ">7";
  if (sizeMb > 3.5) return ">3.5";
  return "<=3.5";
}

/**
 * Copy number variation classification from its size (Mb) and abnormal-read ratio (%).
 * Smaller CNVs need a higher ratio to be called.
 */
export function classifyCnv(
  sizeMb: number,
  ratioPct: number,
  iteration: TestIteration,
  cfg: ThresholdConfigV1
): CnvClassification {
  const band = cnvBand(sizeMb);
  const threshold = cnvThresholds(cfg, iteration)[band];

  if (!isRetest(iteration)) {
    const result =
      ratioPct >= threshold
        ? makeResult("High Risk -> Re-library", "HIGH", "RELIBRARY")
        : makeResult("Low Risk", "LOW", "NEGATIVE");
    return { result, band, threshold };
  }

  const ratio = ratioPct.toFixed(1);
  const result =
    ratioPct >= threshold
      ? makeResult(`POSITIVE (Ratio:${ratio}%, ${retestLabel(iteration)})`, "POSITIVE", "POSITIVE")
      : makeResult(`High Risk (Ratio:${ratio}%) -> Resample for verification`, "HIGH", "RESAMPLE");
  return { result, band, threshold };
}
