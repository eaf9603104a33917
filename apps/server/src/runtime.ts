import type { FastifyBaseLogger } from "fastify";

import type {
  AuditEntryV1,
  PatientUpdateRequestV1,
  PatientV1,
  QcOverrideRequestV1,
  QcStatus,
  ResultRecordV1,
  ResultUpdateRequestV1,
  SampleInputV1,
  SampleInterpretationV1,
  SaveResultRequestV1,
  ThresholdConfigV1,
} from "@nipt-console/contracts";
import {
  DISPOSITION_LABELS,
  QcOverrideRejected,
  applyQcOverride,
  effectiveQcStatus,
  gateFindings,
  interpretSample,
  maternalAgeRisk,
  recommendFindings,
  removeQcOverride,
  snapshotConfig,
  validateAge,
  validateMrn,
  validateSampleInputs,
  type AgeRisk,
  type FindingRecommendationsV1,
  type FindingReportabilityV1,
  type QcOverrideStateV1,
} from "@nipt-console/screening-kernel";

import { preparePatch } from "./config/patch";
import { getManifest, validateEffectiveConfig, type ScreeningConfigManifestV1 } from "./config/ssot";
import { ScreeningError } from "./errors";
import type { AnalyticsSummaryV1, NewResultV1, ScreeningSqliteStore } from "./store/sqlite_store";
import { nowMs } from "./util";

export type ResultViewV1 = {
  result: ResultRecordV1;
  disposition_label: string;
  effective_qc_status: QcStatus;
  // Gate re-run with the effective QC status and override flag; the stored one is the pre-override view.
  reportability: FindingReportabilityV1;
  recommendations: FindingRecommendationsV1;
};

export type ConfigPatchOutcomeV1 = {
  ok: true;
  dryRun: boolean;
  ssot_hash: string;
  effective_hash: string;
  changed_paths: string[];
  revision: number | null;
  errors: [];
};

function analysedFields(
  sample: SampleInputV1,
  interpretation: SampleInterpretationV1
): Omit<NewResultV1, "patient_id" | "created_at_ts" | "created_by"> {
  return {
    panel: sample.metrics.panel,
    test_number: interpretation.test_number,
    qc_status: interpretation.qc.status,
    qc_issues: interpretation.qc.issues,
    qc_advice: interpretation.qc.advice,
    metrics: sample.metrics,
    z_scores: sample.z_scores,
    interpretation,
    disposition: interpretation.disposition,
  };
}

function overrideState(r: ResultRecordV1): QcOverrideStateV1 {
  const i = r.interpretation;
  return {
    qc_status: r.qc_status,
    disposition: r.disposition,
    qc_override: r.qc_override,
    texts: [i.trisomy["21"].result_text, i.trisomy["18"].result_text, i.trisomy["13"].result_text, i.sca.result_text],
    cnv_count: i.cnv.length,
    rat_count: i.rat.length,
  };
}

/**
 * Holds the active threshold snapshot and the registry store.
 *
 * Contract:
 * - every evaluation reads one frozen snapshot; a config commit swaps the reference
 * - the latest committed config revision wins over the SSOT file at startup
 */
export class ScreeningRuntime {
  private store: ScreeningSqliteStore;
  private log: FastifyBaseLogger;
  private snapshot: ThresholdConfigV1;
  private revision: number | null = null;

  constructor(args: { store: ScreeningSqliteStore; log: FastifyBaseLogger; ssotConfig: ThresholdConfigV1 }) {
    this.store = args.store;
    this.log = args.log;
    this.snapshot = snapshotConfig(args.ssotConfig);

    const latest = this.store.latestConfigRevision();
    if (latest) {
      this.snapshot = snapshotConfig(validateEffectiveConfig(latest.config));
      this.revision = latest.id;
      this.log.info({ revision: latest.id, ssot_hash: latest.ssot_hash }, "loaded committed screening config revision");
    }
  }

  config(): ThresholdConfigV1 {
    return this.snapshot;
  }

  interpret(input: SampleInputV1): SampleInterpretationV1 {
    return interpretSample(this.snapshot, input);
  }

  maternalAgeRisk(age: number): AgeRisk {
    return maternalAgeRisk(age);
  }

  saveResult(req: SaveResultRequestV1): { patient: PatientV1; view: ResultViewV1 } {
    const cfg = this.snapshot;

    const mrn = validateMrn(req.patient.mrn, cfg.registry?.allow_alphanumeric_mrn ?? false);
    if (!mrn.ok) throw new ScreeningError("INVALID_MRN", mrn.error);
    const patientInput = { ...req.patient, mrn: req.patient.mrn.trim() };

    const m = req.sample.metrics;
    const rangeErrors = validateSampleInputs({ reads: m.reads, cff: m.cff, gc: m.gc, age: req.patient.age });
    if (rangeErrors.length) throw new ScreeningError("INPUT_OUT_OF_RANGE", rangeErrors.join("; "), rangeErrors);

    const interpretation = interpretSample(cfg, req.sample);
    const at = nowMs();

    const { patient, result } = this.store.transaction(() => {
      const existing = this.store.getPatientByMrn(patientInput.mrn);
      if (existing && !req.allow_duplicate) {
        throw new ScreeningError(
          "DUPLICATE_PATIENT",
          `Patient with MRN '${existing.mrn}' already exists in registry as '${existing.full_name}'`
        );
      }
      const patient = existing ?? this.store.insertPatient(patientInput, at);
      const result = this.store.insertResult({
        ...analysedFields(req.sample, interpretation),
        patient_id: patient.id,
        created_at_ts: at,
        created_by: req.actor,
      });
      this.store.insertAudit({
        actor: req.actor,
        action: "SAVE_RESULT",
        details: `Created result ${result.id} for patient ${patient.mrn} (Test #${result.test_number})`,
        at_ts: at,
      });
      return { patient, result };
    });

    this.log.info({ result_id: result.id, patient_id: patient.id, disposition: result.disposition }, "result saved");
    return { patient, view: this.view(result) };
  }

  private view(result: ResultRecordV1): ResultViewV1 {
    const effective = effectiveQcStatus(result);
    return {
      result,
      disposition_label: DISPOSITION_LABELS[result.disposition],
      effective_qc_status: effective,
      reportability: gateFindings(result.interpretation, result.qc_status, result.qc_override !== null),
      recommendations: recommendFindings(result.interpretation),
    };
  }

  private requireResult(id: number): ResultRecordV1 {
    const r = this.store.getResult(id);
    if (!r) throw new ScreeningError("RESULT_NOT_FOUND", `Result ${id} not found`);
    return r;
  }

  getResult(id: number): ResultViewV1 {
    return this.view(this.requireResult(id));
  }

  listResults(args: { limit: number; patient_id?: number }): ResultViewV1[] {
    return this.store.listResults(args).map((r) => this.view(r));
  }

  /**
   * Re-interprets a stored result from corrected inputs against the active snapshot.
   * A result under QC override is refused unless `clear_override` drops the override too.
   */
  updateResult(id: number, req: ResultUpdateRequestV1): ResultViewV1 {
    const cfg = this.snapshot;

    const updated = this.store.transaction(() => {
      const r = this.requireResult(id);
      if (r.qc_override && !req.clear_override) {
        throw new ScreeningError(
          "RESULT_OVERRIDE_ACTIVE",
          `Result ${id} has an active QC override; remove it first or set clear_override`
        );
      }

      const m = req.sample.metrics;
      const patient = this.store.getPatient(r.patient_id);
      if (!patient) throw new ScreeningError("PATIENT_NOT_FOUND", `Patient ${r.patient_id} not found`);
      const rangeErrors = validateSampleInputs({ reads: m.reads, cff: m.cff, gc: m.gc, age: patient.age });
      if (rangeErrors.length) throw new ScreeningError("INPUT_OUT_OF_RANGE", rangeErrors.join("; "), rangeErrors);

      const interpretation = interpretSample(cfg, req.sample);
      const fields = analysedFields(req.sample, interpretation);
      this.store.updateResult(id, fields, null);

      const cleared = r.qc_override ? "; QC override cleared" : "";
      this.store.insertAudit({
        actor: req.actor,
        action: "UPDATE_RESULT",
        details:
          `Updated result ${id} (Test #${fields.test_number}). ` +
          `Summary changed from '${DISPOSITION_LABELS[r.disposition]}' to '${DISPOSITION_LABELS[fields.disposition]}'${cleared}`,
        at_ts: nowMs(),
      });
      return { ...r, ...fields, qc_override: null };
    });

    this.log.info({ result_id: id, actor: req.actor, disposition: updated.disposition }, "result updated");
    return this.view(updated);
  }

  updatePatient(id: number, req: PatientUpdateRequestV1): PatientV1 {
    if (req.age !== undefined) {
      const ageError = validateAge(req.age);
      if (ageError) throw new ScreeningError("INPUT_OUT_OF_RANGE", ageError, [ageError]);
    }

    const { actor, ...changes } = req;
    const out = this.store.transaction(() => {
      const res = this.store.updatePatient(id, changes);
      if (!res) throw new ScreeningError("PATIENT_NOT_FOUND", `Patient ${id} not found`);
      this.store.insertAudit({
        actor,
        action: "UPDATE_PATIENT",
        details: `Updated patient ${res.patient.mrn}: ${res.changed.length ? res.changed.join(", ") : "no changes"}`,
        at_ts: nowMs(),
      });
      return res;
    });

    this.log.info({ patient_id: id, actor, changed: out.changed }, "patient updated");
    return out.patient;
  }

  deleteResult(id: number, actor: string): void {
    this.store.transaction(() => {
      if (!this.store.deleteResult(id)) throw new ScreeningError("RESULT_NOT_FOUND", `Result ${id} not found`);
      this.store.insertAudit({ actor, action: "DELETE_RESULT", details: `Deleted result ${id}`, at_ts: nowMs() });
    });
    this.log.info({ result_id: id, actor }, "result deleted");
  }

  deletePatient(id: number, actor: string): { result_count: number } {
    const deleted = this.store.transaction(() => {
      const out = this.store.deletePatient(id);
      if (!out) throw new ScreeningError("PATIENT_NOT_FOUND", `Patient ${id} not found`);
      this.store.insertAudit({
        actor,
        action: "DELETE_PATIENT",
        details: `Deleted patient ${out.patient.mrn} (${out.patient.full_name}) and ${out.result_count} results`,
        at_ts: nowMs(),
      });
      return out;
    });
    this.log.info({ patient_id: id, result_count: deleted.result_count, actor }, "patient deleted");
    return { result_count: deleted.result_count };
  }

  private mapOverrideError(e: unknown): unknown {
    return e instanceof QcOverrideRejected ? new ScreeningError(e.code, e.message.slice(e.code.length + 2)) : e;
  }

  applyQcOverride(id: number, req: QcOverrideRequestV1): ResultViewV1 {
    const updated = this.store.transaction(() => {
      const r = this.requireResult(id);
      const at = nowMs();
      let next: QcOverrideStateV1;
      try {
        next = applyQcOverride(overrideState(r), { reason: req.reason, actor: req.actor, at_ts: at });
      } catch (e: unknown) {
        throw this.mapOverrideError(e);
      }

      this.store.updateResultOverride(id, next.disposition, next.qc_override);
      this.store.insertAudit({
        actor: req.actor,
        action: "QC_OVERRIDE",
        details:
          `QC override applied to result ${id}: ${req.reason.trim()}. ` +
          `Summary changed from '${DISPOSITION_LABELS[r.disposition]}' to '${DISPOSITION_LABELS[next.disposition]}'`,
        at_ts: at,
      });
      return { ...r, disposition: next.disposition, qc_override: next.qc_override };
    });

    this.log.info({ result_id: id, actor: req.actor, disposition: updated.disposition }, "qc override applied");
    return this.view(updated);
  }

  removeQcOverride(id: number, actor: string): ResultViewV1 {
    const updated = this.store.transaction(() => {
      const r = this.requireResult(id);
      let next: QcOverrideStateV1;
      try {
        next = removeQcOverride(overrideState(r));
      } catch (e: unknown) {
        throw this.mapOverrideError(e);
      }

      this.store.updateResultOverride(id, next.disposition, null);
      this.store.insertAudit({
        actor,
        action: "QC_OVERRIDE_REMOVED",
        details: `QC override removed from result ${id}. Summary restored to '${DISPOSITION_LABELS[next.disposition]}'`,
        at_ts: nowMs(),
      });
      return { ...r, disposition: next.disposition, qc_override: null };
    });

    this.log.info({ result_id: id, actor, disposition: updated.disposition }, "qc override removed");
    return this.view(updated);
  }

  qcOverrideInfo(id: number): ResultRecordV1["qc_override"] {
    return this.requireResult(id).qc_override;
  }

  getManifest(): ScreeningConfigManifestV1 {
    return getManifest(this.snapshot, this.revision);
  }

  patchConfig(body: unknown): ConfigPatchOutcomeV1 {
    const current = this.snapshot;
    const prepared = preparePatch(body, current, getManifest(current, this.revision));

    if (prepared.dryRun) {
      return {
        ok: true,
        dryRun: true,
        ssot_hash: prepared.ssot_hash,
        effective_hash: prepared.effective_hash,
        changed_paths: prepared.changed_paths,
        revision: this.revision,
        errors: [],
      };
    }

    const at = nowMs();
    const revision = this.store.transaction(() => {
      const id = this.store.insertConfigRevision({
        ssot_hash: prepared.effective_hash,
        parent_hash: prepared.ssot_hash,
        actor: prepared.actor,
        changed_paths: prepared.changed_paths,
        config: prepared.effective,
        created_at_ts: at,
      });
      this.store.insertAudit({
        actor: prepared.actor,
        action: "CONFIG_PATCH",
        details: `Config revision ${id}: ${prepared.changed_paths.join(", ")}`,
        at_ts: at,
      });
      return id;
    });

    this.snapshot = snapshotConfig(prepared.effective);
    this.revision = revision;
    this.log.info({ revision, ssot_hash: prepared.effective_hash, changed_paths: prepared.changed_paths }, "screening config committed");

    return {
      ok: true,
      dryRun: false,
      ssot_hash: prepared.ssot_hash,
      effective_hash: prepared.effective_hash,
      changed_paths: prepared.changed_paths,
      revision,
      errors: [],
    };
  }

  analytics(): AnalyticsSummaryV1 {
    return this.store.analyticsSummary();
  }

  audit(limit: number): AuditEntryV1[] {
    return this.store.listAudit(limit);
  }
}
