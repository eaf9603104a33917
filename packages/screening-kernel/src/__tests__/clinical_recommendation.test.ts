import assert from "node:assert";
import { describe, it } from "node:test";

import {
  POSITIVE_RECOMMENDATIONS,
  REANALYSIS_RECOMMENDATION,
  ROUTINE_RECOMMENDATION,
  clinicalRecommendation,
  recommendFindings,
} from "../advice/clinical_recommendation";
import { interpretSample } from "../interpreter";
import { EMPTY_CFG, sampleInput } from "./fixtures";

describe("clinicalRecommendation", () => {
  it("gives condition-specific advice for positive findings", () => {
    assert.strictEqual(
      clinicalRecommendation("POSITIVE", "T21"),
      "Confirmatory diagnostic testing (amniocentesis or CVS) is strongly recommended. Genetic counseling should be offered."
    );
    assert.strictEqual(clinicalRecommendation("POSITIVE (XXY)", "SCA"), POSITIVE_RECOMMENDATIONS.SCA);
    assert.strictEqual(clinicalRecommendation("POSITIVE (Ratio:12.0%, 2nd Test)", "CNV"), POSITIVE_RECOMMENDATIONS.CNV);
    assert.strictEqual(POSITIVE_RECOMMENDATIONS.T18, POSITIVE_RECOMMENDATIONS.T13);
  });

  it("a retest high band that reports positive gets positive advice", () => {
    assert.strictEqual(
      clinicalRecommendation("High Risk (Z:5.00) -> Report Positive if consistent", "T18"),
      POSITIVE_RECOMMENDATIONS.T18
    );
  });

  it("recommends re-analysis for high-risk and ambiguous findings", () => {
    assert.strictEqual(clinicalRecommendation("High Risk (Z:3.10) -> Re-library", "T21"), REANALYSIS_RECOMMENDATION);
    assert.strictEqual(clinicalRecommendation("Ambiguous SCA -> Re-library", "SCA"), REANALYSIS_RECOMMENDATION);
    assert.strictEqual(clinicalRecommendation("ambiguous -> re-library", "RAT"), REANALYSIS_RECOMMENDATION);
  });

  it("defaults to routine care", () => {
    assert.strictEqual(clinicalRecommendation("Low Risk", "T13"), ROUTINE_RECOMMENDATION);
    assert.strictEqual(clinicalRecommendation("Negative (Female)", "SCA"), ROUTINE_RECOMMENDATION);
    assert.strictEqual(clinicalRecommendation("Invalid Data", "T21"), ROUTINE_RECOMMENDATION);
  });
});

describe("recommendFindings", () => {
  it("covers every finding of an interpretation", () => {
    const interp = interpretSample(
      EMPTY_CFG,
      sampleInput({
        z_scores: { "21": 7, "18": 3, "13": 0, XX: 0, XY: 0 },
        cnv: [{ size_mb: 12, ratio_pct: 2 }],
        rat: [{ chromosome: 7, z_score: 9 }],
      })
    );
    assert.deepStrictEqual(recommendFindings(interp), {
      t21: POSITIVE_RECOMMENDATIONS.T21,
      t18: REANALYSIS_RECOMMENDATION,
      t13: ROUTINE_RECOMMENDATION,
      sca: ROUTINE_RECOMMENDATION,
      cnv: [ROUTINE_RECOMMENDATION],
      rat: [POSITIVE_RECOMMENDATIONS.RAT],
    });
  });
});
