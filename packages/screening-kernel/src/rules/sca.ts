import type { ClassificationResult, TestIteration, ThresholdConfigV1 } from "@nipt-console/contracts";

import { qcThresholds, scaThresholds } from "../config/accessor";
import { formatZ, isRetest, makeResult, retestLabel } from "./result";

export const SCA_TYPES = ["XX", "XY", "XO", "XXX", "XXY", "XYY", "XXX+XY", "XO+XY"] as const;
export type ScaType = (typeof SCA_TYPES)[number];

export function isScaType(s: string): s is ScaType {
  return SCA_TYPES.some((t) => t === s);
}

/**
 * Sex chromosome aneuploidy classification.
 *
 * Low fetal fraction invalidates the call before the karyotype is looked at.
 */
export function classifySca(
  cfg: ThresholdConfigV1,
  scaType: string,
  zXX: number,
  zXY: number,
  cff: number,
  iteration: TestIteration
): ClassificationResult {
  const minCff = qcThresholds(cfg).min_cff;
  const t = scaThresholds(cfg, iteration);
  const retest = isRetest(iteration);

  if (cff < minCff) {
    return retest
      ? makeResult(`INVALID (Cff < ${minCff}%) -> Do not refer to previous result`, "INVALID", "INVALID")
      : makeResult(`INVALID (Cff < ${minCff}%) -> Resample`, "INVALID", "RESAMPLE");
  }

  const suffix = retest ? `, ${retestLabel(iteration)}` : "";

  if (!isScaType(scaType)) {
    return retest
      ? makeResult("Ambiguous SCA -> Resample for verification", "HIGH", "RESAMPLE")
      : makeResult("Ambiguous SCA -> Re-library", "HIGH", "RELIBRARY");
  }

  // Karyotypes confirmed only when their Z-score reaches the threshold.
  const zConfirmed = (axis: "xx" | "xy", name: string): ClassificationResult => {
    const z = axis === "xx" ? zXX : zXY;
    const threshold = axis === "xx" ? t.xx_threshold : t.xy_threshold;
    if (z >= threshold) return makeResult(`POSITIVE (${name}${suffix})`, "POSITIVE", "POSITIVE");
    return retest
      ? makeResult(`${scaType} (Z:${formatZ(z)}) -> Resample for verification`, "HIGH", "RESAMPLE")
      : makeResult(`Ambiguous ${scaType} -> Re-library`, "HIGH", "RELIBRARY");
  };

  switch (scaType) {
    case "XX":
      return makeResult(`Negative (Female${suffix})`, "LOW", "NEGATIVE");
    case "XY":
      return makeResult(`Negative (Male${suffix})`, "LOW", "NEGATIVE");
    // Reported positive whatever the Z-scores say.
    case "XXY":
    case "XYY":
    case "XXX+XY":
      return makeResult(`POSITIVE (${scaType}${suffix})`, "POSITIVE", "POSITIVE");
    case "XO":
      return zConfirmed("xx", "Turner XO");
    case "XXX":
      return zConfirmed("xx", "Triple X");
    case "XO+XY":
      return zConfirmed("xy", "XO+XY");
  }

  const _never: never = scaType;
  throw new Error(`UNREACHABLE_SCA_TYPE: ${String(_never)}`);
}
