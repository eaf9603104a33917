// Screening Kernel - reportability gate (v1)
//
// Decides whether a finding may be released to the clinician. Priority order:
//   1. QC FAIL without override          -> No  "QC Fail"
//   2. re-library                        -> No  "Re-library required"
//   3. resample                          -> No  "Resample required"
//   4. ambiguous                         -> No  "Ambiguous result"
//   5. invalid without override          -> No  "Invalid result"
//   6. positive                          -> Yes "Screen Positive"
//   7. low risk / negative               -> Yes "Screen Negative"
//   8. anything else                     -> Yes "Result available"
// An override lifts rules 1 and 5 only.

import type {
  ClassificationResult,
  CnvFinding,
  QcStatus,
  RatFinding,
  ReportDirective,
  Reportability,
} from "@nipt-console/contracts";

function verdict(reportable: "Yes" | "No", reason: string): Reportability {
  return { reportable, reason };
}

/**
 * Applies the gate to a classifier's directive tag.
 */
export function gateDirective(directive: ReportDirective, qcStatus: QcStatus, qcOverride: boolean): Reportability {
  if (qcStatus === "FAIL" && !qcOverride) return verdict("No", "QC Fail");

  switch (directive) {
    case "RELIBRARY":
      return verdict("No", "Re-library required");
    case "RESAMPLE":
      return verdict("No", "Resample required");
    case "AMBIGUOUS":
      return verdict("No", "Ambiguous result");
    case "INVALID":
      return qcOverride ? verdict("Yes", "Result available") : verdict("No", "Invalid result");
    case "POSITIVE":
      return verdict("Yes", "Screen Positive");
    case "NEGATIVE":
      return verdict("Yes", "Screen Negative");
    case "NONE":
      return verdict("Yes", "Result available");
  }

  const _never: never = directive;
  throw new Error(`UNREACHABLE_DIRECTIVE: ${String(_never)}`);
}

/**
 * Recovers the directive tag from a result text by keyword, in gate priority order.
 * Used for texts stored without a tag.
 */
export function directiveFromText(resultText: string): ReportDirective {
  const u = resultText.toUpperCase();
  if (u.includes("RE-LIBRARY") || u.includes("RELIBRARY")) return "RELIBRARY";
  if (u.includes("RESAMPLE")) return "RESAMPLE";
  if (u.includes("AMBIGUOUS")) return "AMBIGUOUS";
  if (u.includes("INVALID")) return "INVALID";
  if (u.includes("POSITIVE")) return "POSITIVE";
  if (u.includes("LOW") || u.includes("NEGATIVE")) return "NEGATIVE";
  return "NONE";
}

export function isReportable(resultText: string, qcStatus: QcStatus, qcOverride: boolean): Reportability {
  return gateDirective(directiveFromText(resultText), qcStatus, qcOverride);
}

export type FindingReportabilityV1 = {
  t21: Reportability;
  t18: Reportability;
  t13: Reportability;
  sca: Reportability;
  cnv: Reportability[];
  rat: Reportability[];
};

/**
 * Gate every finding of one sample under the same QC status / override.
 */
export function gateFindings(
  findings: {
    trisomy: { "21": ClassificationResult; "18": ClassificationResult; "13": ClassificationResult };
    sca: ClassificationResult;
    cnv: ReadonlyArray<CnvFinding>;
    rat: ReadonlyArray<RatFinding>;
  },
  qcStatus: QcStatus,
  qcOverride: boolean
): FindingReportabilityV1 {
  const gate = (r: ClassificationResult) => gateDirective(r.directive, qcStatus, qcOverride);
  return {
    t21: gate(findings.trisomy["21"]),
    t18: gate(findings.trisomy["18"]),
    t13: gate(findings.trisomy["13"]),
    sca: gate(findings.sca),
    cnv: findings.cnv.map((f) => gate(f.result)),
    rat: findings.rat.map((f) => gate(f.result)),
  };
}
