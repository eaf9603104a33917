import assert from "node:assert";
import { describe, it } from "node:test";

import { interpretSample } from "../interpreter";
import {
  QcOverrideRejected,
  type QcOverrideStateV1,
  applyQcOverride,
  effectiveQcStatus,
  recomputeDispositionFromTexts,
  removeQcOverride,
} from "../override/qc_override";
import { CLEAN_METRICS, EMPTY_CFG, sampleInput } from "./fixtures";

const LOW_TEXTS = ["Low Risk", "Low Risk", "Low Risk", "Negative (Female)"];

function failedState(): QcOverrideStateV1 {
  const out = interpretSample(EMPTY_CFG, sampleInput({ metrics: { ...CLEAN_METRICS, reads: 3 } }));
  return {
    qc_status: out.qc.status,
    disposition: out.disposition,
    qc_override: null,
    texts: [out.trisomy["21"].result_text, out.trisomy["18"].result_text, out.trisomy["13"].result_text, out.sca.result_text],
    cnv_count: out.cnv.length,
    rat_count: out.rat.length,
  };
}

function rejectedWith(code: string) {
  return (err: unknown) => err instanceof QcOverrideRejected && err.code === code;
}

describe("QC override", () => {
  it("recomputes the disposition from result texts", () => {
    assert.strictEqual(recomputeDispositionFromTexts(LOW_TEXTS, 0, 0), "NEGATIVE");
    assert.strictEqual(recomputeDispositionFromTexts(LOW_TEXTS, 1, 0), "HIGH_RISK");
    assert.strictEqual(recomputeDispositionFromTexts(LOW_TEXTS, 0, 2), "HIGH_RISK");
    assert.strictEqual(recomputeDispositionFromTexts(["High Risk (Z:3.00) -> Re-library", "Low Risk", "Low Risk", "Negative (Male)"], 0, 0), "HIGH_RISK");
    assert.strictEqual(recomputeDispositionFromTexts(["Low Risk", "Low Risk", "Low Risk", "POSITIVE (XXY)"], 0, 0), "POSITIVE");
  });

  it("round-trips a QC-failed result", () => {
    const before = failedState();
    assert.strictEqual(before.disposition, "INVALID_QC_FAIL");
    assert.strictEqual(effectiveQcStatus(before), "FAIL");

    const applied = applyQcOverride(before, { reason: "  clinically acceptable ", actor: "dr.test", at_ts: 1000 });
    assert.strictEqual(applied.disposition, "NEGATIVE");
    assert.strictEqual(effectiveQcStatus(applied), "PASS");
    assert.deepStrictEqual(applied.qc_override, {
      reason: "clinically acceptable",
      actor: "dr.test",
      at_ts: 1000,
      prior_disposition: "INVALID_QC_FAIL",
    });

    const removed = removeQcOverride(applied);
    assert.deepStrictEqual(removed, before);
    assert.strictEqual(effectiveQcStatus(removed), "FAIL");
  });

  it("restores the prior disposition when QC did not fail", () => {
    const before: QcOverrideStateV1 = {
      qc_status: "WARNING",
      disposition: "HIGH_RISK",
      qc_override: null,
      texts: LOW_TEXTS,
      cnv_count: 1,
      rat_count: 0,
    };
    assert.deepStrictEqual(removeQcOverride(applyQcOverride(before, { reason: "ok", actor: "lab", at_ts: 1 })), before);
  });

  it("rejects a blank reason", () => {
    assert.throws(() => applyQcOverride(failedState(), { reason: "   ", actor: "lab", at_ts: 1 }), rejectedWith("OVERRIDE_REASON_REQUIRED"));
  });

  it("rejects removing an absent override and applying twice", () => {
    const s = failedState();
    assert.throws(() => removeQcOverride(s), rejectedWith("OVERRIDE_NOT_APPLIED"));
    const applied = applyQcOverride(s, { reason: "ok", actor: "lab", at_ts: 1 });
    assert.throws(() => applyQcOverride(applied, { reason: "again", actor: "lab", at_ts: 2 }), rejectedWith("OVERRIDE_ALREADY_APPLIED"));
  });
});
