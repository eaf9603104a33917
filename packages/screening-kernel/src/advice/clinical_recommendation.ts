import type { SampleInterpretationV1 } from "@nipt-console/contracts";

export type RecommendationTarget = "T21" | "T18" | "T13" | "SCA" | "CNV" | "RAT";

const CONFIRM_AND_ULTRASOUND =
  "Confirmatory diagnostic testing (amniocentesis or CVS) is strongly recommended. Detailed ultrasound and genetic counseling advised.";

export const POSITIVE_RECOMMENDATIONS: Readonly<Record<RecommendationTarget, string>> = Object.freeze({
  T21: "Confirmatory diagnostic testing (amniocentesis or CVS) is strongly recommended. Genetic counseling should be offered.",
  T18: CONFIRM_AND_ULTRASOUND,
  T13: CONFIRM_AND_ULTRASOUND,
  SCA: "Genetic counseling recommended. Confirmatory testing may be considered based on clinical judgment.",
  CNV: "Detailed ultrasound recommended. Genetic counseling and possible confirmatory testing advised.",
  RAT: "Genetic counseling recommended. Clinical correlation and possible confirmatory testing advised.",
});

export const REANALYSIS_RECOMMENDATION = "Re-analysis recommended. If persistent, consider confirmatory diagnostic testing.";

export const ROUTINE_RECOMMENDATION =
  "No additional testing indicated based on NIPT result alone. Standard prenatal care recommended.";

/**
 * Follow-up advice for one finding, read from its result text (case-insensitive):
 * POSITIVE anywhere wins, then HIGH or AMBIGUOUS, else routine care.
 *
 * Invalid and re-sample texts fall through to routine care; their next step is
 * already in the result text.
 */
export function clinicalRecommendation(resultText: string, target: RecommendationTarget): string {
  const t = resultText.toUpperCase();
  if (t.includes("POSITIVE")) return POSITIVE_RECOMMENDATIONS[target];
  if (t.includes("HIGH") || t.includes("AMBIGUOUS")) return REANALYSIS_RECOMMENDATION;
  return ROUTINE_RECOMMENDATION;
}

export type FindingRecommendationsV1 = {
  t21: string;
  t18: string;
  t13: string;
  sca: string;
  cnv: string[];
  rat: string[];
};

export function recommendFindings(
  findings: Pick<SampleInterpretationV1, "trisomy" | "sca" | "cnv" | "rat">
): FindingRecommendationsV1 {
  return {
    t21: clinicalRecommendation(findings.trisomy["21"].result_text, "T21"),
    t18: clinicalRecommendation(findings.trisomy["18"].result_text, "T18"),
    t13: clinicalRecommendation(findings.trisomy["13"].result_text, "T13"),
    sca: clinicalRecommendation(findings.sca.result_text, "SCA"),
    cnv: findings.cnv.map((f) => clinicalRecommendation(f.result.result_text, "CNV")),
    rat: findings.rat.map((f) => clinicalRecommendation(f.result.result_text, "RAT")),
  };
}
