import assert from "node:assert";
import { describe, it } from "node:test";

import { classifyCnv, cnvBand } from "../rules/cnv";
import { EMPTY_CFG } from "./fixtures";

describe("classifyCnv", () => {
  it("bands sizes first match wins", () => {
    assert.strictEqual(cnvBand(15), ">=10");
    assert.strictEqual(cnvBand(10), ">=10");
    assert.strictEqual(cnvBand(7.5), ">7");
    assert.strictEqual(cnvBand(7), ">3.5");
    assert.strictEqual(cnvBand(3.5), "<=3.5");
  });

  it("1st test: re-library at or above the band threshold", () => {
    const low = classifyCnv(15.0, 4.0, 1, EMPTY_CFG);
    assert.strictEqual(low.threshold, 6.0);
    assert.strictEqual(low.result.risk_tier, "LOW");
    assert.strictEqual(low.result.result_text, "Low Risk");

    const high = classifyCnv(15.0, 7.0, 1, EMPTY_CFG);
    assert.strictEqual(high.result.risk_tier, "HIGH");
    assert.strictEqual(high.result.result_text, "High Risk -> Re-library");
  });

  it("retests: positive or resample with the ratio", () => {
    const pos = classifyCnv(8, 8.0, 2, EMPTY_CFG);
    assert.strictEqual(pos.band, ">7");
    assert.strictEqual(pos.result.result_text, "POSITIVE (Ratio:8.0%, 2nd test)");

    const resample = classifyCnv(8, 7.4, 2, EMPTY_CFG);
    assert.strictEqual(resample.result.result_text, "High Risk (Ratio:7.4%) -> Resample for verification");
    assert.strictEqual(resample.result.directive, "RESAMPLE");
  });

  it("uses per-iteration band thresholds", () => {
    const cfg = { schema_version: "1.0.0", thresholds: { cnv: { "2": { ">7": 7 } } } };
    const r = classifyCnv(8, 7.4, 2, cfg);
    assert.strictEqual(r.threshold, 7);
    assert.strictEqual(r.result.risk_tier, "POSITIVE");
    assert.strictEqual(classifyCnv(2, 11, 3, cfg).threshold, 12);
  });
});
