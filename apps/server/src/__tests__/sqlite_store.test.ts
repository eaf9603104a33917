import assert from "node:assert";
import { describe, it } from "node:test";

import Fastify from "fastify";

import type { SampleInputV1, ThresholdConfigV1 } from "@nipt-console/contracts";
import { interpretSample } from "@nipt-console/screening-kernel";

import { ScreeningRuntime } from "../runtime";
import { ScreeningSqliteStore, computeBmi, type NewResultV1 } from "../store/sqlite_store";
import { CLEAN_METRICS, sampleInput } from "./fixtures";

const CFG: ThresholdConfigV1 = { schema_version: "1.0.0" };

const PATIENT = {
  mrn: "1001",
  full_name: "Test Patient",
  age: 34,
  weeks: 11,
  weight_kg: 70,
  height_cm: 165,
  clinical_notes: "",
};

function newResult(patient_id: number, input: SampleInputV1, at: number): NewResultV1 {
  const interpretation = interpretSample(CFG, input);
  return {
    patient_id,
    panel: input.metrics.panel,
    test_number: interpretation.test_number,
    qc_status: interpretation.qc.status,
    qc_issues: interpretation.qc.issues,
    qc_advice: interpretation.qc.advice,
    metrics: input.metrics,
    z_scores: input.z_scores,
    interpretation,
    disposition: interpretation.disposition,
    created_at_ts: at,
    created_by: "tech.test",
  };
}

describe("ScreeningSqliteStore", () => {
  it("computes BMI to one decimal", () => {
    assert.strictEqual(computeBmi(70, 165), 25.7);
    assert.strictEqual(computeBmi(null, 165), null);
    assert.strictEqual(computeBmi(70, 0), null);
  });

  it("round-trips patients and results", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const patient = store.insertPatient(PATIENT, 1000);
    assert.strictEqual(patient.id, 1);
    assert.strictEqual(patient.bmi, 25.7);
    assert.deepStrictEqual(store.getPatientByMrn("1001"), patient);
    assert.strictEqual(store.getPatientByMrn("9999"), null);

    const saved = store.insertResult(newResult(patient.id, sampleInput(), 2000));
    assert.strictEqual(saved.id, 1);
    assert.deepStrictEqual(store.getResult(saved.id), saved);
    assert.strictEqual(store.getResult(42), null);
    store.close();
  });

  it("updates demographics and recomputes BMI", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const p = store.insertPatient(PATIENT, 1000);

    const out = store.updatePatient(p.id, { weight_kg: 60, clinical_notes: "follow-up" });
    assert.deepStrictEqual(out?.changed, ["weight_kg", "clinical_notes"]);
    assert.strictEqual(out?.patient.bmi, 22);
    assert.strictEqual(out?.patient.mrn, "1001");
    assert.deepStrictEqual(store.getPatient(p.id), out?.patient);

    const cleared = store.updatePatient(p.id, { weeks: null, height_cm: null });
    assert.deepStrictEqual(cleared?.changed, ["weeks", "height_cm"]);
    assert.strictEqual(cleared?.patient.bmi, null);

    assert.strictEqual(store.updatePatient(99, { age: 30 }), null);
    store.close();
  });

  it("replaces the analysed content of a result", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const p = store.insertPatient(PATIENT, 1000);
    const r = store.insertResult(newResult(p.id, sampleInput(), 2000));
    store.updateResultOverride(r.id, "NEGATIVE", { reason: "reviewed", actor: "dr.test", at_ts: 2500, prior_disposition: "NEGATIVE" });

    const next = newResult(p.id, sampleInput({ z_scores: { "21": 7, "18": 0, "13": 0 } }), 9000);
    store.updateResult(r.id, next, null);

    const got = store.getResult(r.id);
    assert.strictEqual(got?.disposition, "POSITIVE");
    assert.strictEqual(got?.qc_override, null);
    assert.strictEqual(got?.created_at_ts, 2000);
    assert.deepStrictEqual(got?.z_scores, { "21": 7, "18": 0, "13": 0 });
    assert.deepStrictEqual(got?.interpretation, next.interpretation);
    store.close();
  });

  it("lists newest first and filters by patient", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const a = store.insertPatient(PATIENT, 1000);
    const b = store.insertPatient({ ...PATIENT, mrn: "1002" }, 1000);
    store.insertResult(newResult(a.id, sampleInput(), 2000));
    store.insertResult(newResult(b.id, sampleInput(), 2000));
    store.insertResult(newResult(a.id, sampleInput({ test_number: 2 }), 3000));

    assert.deepStrictEqual(store.listResults({ limit: 10 }).map((r) => r.id), [3, 2, 1]);
    assert.deepStrictEqual(store.listResults({ limit: 10, patient_id: a.id }).map((r) => r.id), [3, 1]);
    assert.deepStrictEqual(store.listResults({ limit: 1 }).map((r) => r.id), [3]);
    store.close();
  });

  it("stores and clears QC override info", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const p = store.insertPatient(PATIENT, 1000);
    const r = store.insertResult(newResult(p.id, sampleInput({ metrics: { ...CLEAN_METRICS, reads: 3 } }), 2000));
    assert.strictEqual(r.disposition, "INVALID_QC_FAIL");

    const info = { reason: "reviewed", actor: "dr.test", at_ts: 3000, prior_disposition: "INVALID_QC_FAIL" as const };
    store.updateResultOverride(r.id, "NEGATIVE", info);
    assert.deepStrictEqual(store.getResult(r.id)?.qc_override, info);
    assert.strictEqual(store.getResult(r.id)?.disposition, "NEGATIVE");

    store.updateResultOverride(r.id, "INVALID_QC_FAIL", null);
    assert.strictEqual(store.getResult(r.id)?.qc_override, null);
    store.close();
  });

  it("cascades patient deletion to results", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const p = store.insertPatient(PATIENT, 1000);
    store.insertResult(newResult(p.id, sampleInput(), 2000));
    store.insertResult(newResult(p.id, sampleInput(), 2001));

    const out = store.deletePatient(p.id);
    assert.strictEqual(out?.result_count, 2);
    assert.deepStrictEqual(store.listResults({ limit: 10 }), []);
    assert.strictEqual(store.deletePatient(p.id), null);
    assert.strictEqual(store.deleteResult(1), false);
    store.close();
  });

  it("rolls back a failed transaction", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    assert.throws(() =>
      store.transaction(() => {
        store.insertPatient(PATIENT, 1000);
        throw new Error("boom");
      })
    );
    assert.strictEqual(store.getPatientByMrn("1001"), null);
    store.close();
  });

  it("lists audit entries newest first", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    store.insertAudit({ actor: "a", action: "SAVE_RESULT", details: "first", at_ts: 1 });
    store.insertAudit({ actor: "b", action: "DELETE_RESULT", details: "second", at_ts: 2 });
    assert.deepStrictEqual(
      store.listAudit(10).map((e) => [e.id, e.action]),
      [
        [2, "DELETE_RESULT"],
        [1, "SAVE_RESULT"],
      ]
    );
    store.close();
  });

  it("summarizes the registry", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    const p = store.insertPatient(PATIENT, 1000);
    store.insertResult(newResult(p.id, sampleInput(), 2000));
    store.insertResult(newResult(p.id, sampleInput({ z_scores: { "21": 7, "18": 0, "13": 0 } }), 2001));
    store.insertResult(newResult(p.id, sampleInput({ metrics: { ...CLEAN_METRICS, panel: "NIPT Plus" } }), 2002));

    assert.deepStrictEqual(store.analyticsSummary(), {
      total_results: 3,
      total_patients: 1,
      qc_status: { FAIL: 1, PASS: 2 },
      disposition: { INVALID_QC_FAIL: 1, NEGATIVE: 1, POSITIVE: 1 },
      panels: { "NIPT Plus": 1, "NIPT Standard": 2 },
      positives: { t21: 1, t18: 0, t13: 0 },
      qc_overrides: 0,
      qc_pass_rate: 2 / 3,
    });
    store.close();
  });
});

describe("ScreeningRuntime startup", () => {
  it("prefers the latest committed config revision over the SSOT", () => {
    const store = new ScreeningSqliteStore({ filePath: ":memory:" });
    store.insertConfigRevision({
      ssot_hash: "sha256:test",
      parent_hash: "sha256:parent",
      actor: "lab",
      changed_paths: ["qc.min_cff"],
      config: { schema_version: "1.0.0", qc: { min_cff: 5 } },
      created_at_ts: 1000,
    });

    const runtime = new ScreeningRuntime({ store, log: Fastify({ logger: false }).log, ssotConfig: CFG });
    assert.strictEqual(runtime.config().qc?.min_cff, 5);
    assert.strictEqual(runtime.getManifest().ssot.revision, 1);
    assert.ok(Object.isFrozen(runtime.config()));
    store.close();
  });
});
