import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import {
  AuditEntryV1Z,
  DispositionZ,
  PatientV1Z,
  QcOverrideInfoV1Z,
  ResultRecordV1Z,
  type AuditEntryV1,
  type Disposition,
  type PatientInputV1,
  type PatientV1,
  type PatientUpdateRequestV1,
  type QcOverrideInfoV1,
  type ResultRecordV1,
  type ThresholdConfigV1,
} from "@nipt-console/contracts";

export type ScreeningStoreConfig = {
  // ":memory:" for an in-process database.
  filePath: string;
};

export type NewResultV1 = Omit<ResultRecordV1, "type" | "id" | "qc_override">;

export type ConfigRevisionV1 = {
  id: number;
  ssot_hash: string;
  parent_hash: string;
  actor: string;
  changed_paths: string[];
  config: unknown;
  created_at_ts: number;
};

export type AnalyticsSummaryV1 = {
  total_results: number;
  total_patients: number;
  qc_status: Record<string, number>;
  disposition: Record<string, number>;
  panels: Record<string, number>;
  positives: { t21: number; t18: number; t13: number };
  qc_overrides: number;
  qc_pass_rate: number | null;
};

const ResultRowZ = z.object({
  id: z.number().int(),
  patient_id: z.number().int(),
  panel: z.string(),
  test_number: z.number().int(),
  qc_status: z.string(),
  disposition: z.string(),
  created_at_ts: z.number().int(),
  created_by: z.string(),
  record_json: z.string(),
  qc_override_json: z.string().nullable(),
});

const RevisionRowZ = z.object({
  id: z.number().int(),
  ssot_hash: z.string(),
  parent_hash: z.string(),
  actor: z.string(),
  changed_paths_json: z.string(),
  config_json: z.string(),
  created_at_ts: z.number().int(),
});

const CountRowZ = z.object({ k: z.string().nullable(), n: z.number().int() });

// Columns kept in record_json (everything not queried by SQL).
const ResultBodyZ = ResultRecordV1Z.pick({
  test_number: true,
  qc_issues: true,
  qc_advice: true,
  metrics: true,
  z_scores: true,
  interpretation: true,
});

function resultBody(r: Omit<NewResultV1, "patient_id" | "created_at_ts" | "created_by">): z.infer<typeof ResultBodyZ> {
  return {
    test_number: r.test_number,
    qc_issues: r.qc_issues,
    qc_advice: r.qc_advice,
    metrics: r.metrics,
    z_scores: r.z_scores,
    interpretation: r.interpretation,
  };
}

/** BMI rounded to one decimal, null unless both weight and height are known. */
export function computeBmi(weight_kg: number | null, height_cm: number | null): number | null {
  if (weight_kg === null || height_cm === null || height_cm <= 0) return null;
  const m = height_cm / 100;
  return Math.round((weight_kg / (m * m)) * 10) / 10;
}

export class ScreeningSqliteStore {
  private db: Database.Database;

  constructor(cfg: ScreeningStoreConfig) {
    if (cfg.filePath !== ":memory:") fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      create table if not exists patients (
        id integer primary key autoincrement,
        mrn text not null unique,
        full_name text not null,
        age integer not null,
        weeks integer,
        weight_kg real,
        height_cm real,
        bmi real,
        clinical_notes text not null default '',
        created_at_ts integer not null
      );

      create table if not exists results (
        id integer primary key autoincrement,
        patient_id integer not null references patients(id) on delete cascade,
        panel text not null,
        test_number integer not null,
        qc_status text not null,
        disposition text not null,
        created_at_ts integer not null,
        created_by text not null,
        record_json text not null,
        qc_override_json text
      );

      create table if not exists audit_log (
        id integer primary key autoincrement,
        actor text not null,
        action text not null,
        details text not null,
        at_ts integer not null
      );

      create table if not exists config_revisions (
        id integer primary key autoincrement,
        ssot_hash text not null,
        parent_hash text not null,
        actor text not null,
        changed_paths_json text not null,
        config_json text not null,
        created_at_ts integer not null
      );

      create index if not exists idx_results_patient on results(patient_id);
      create index if not exists idx_results_created on results(created_at_ts);
      create index if not exists idx_audit_at on audit_log(at_ts);
    `);
  }

  close(): void {
    this.db.close();
  }

  /** Runs `fn` in one SQLite transaction; a throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ---- patients ----

  getPatient(id: number): PatientV1 | null {
    const row = this.db.prepare(`select * from patients where id = ?`).get(id);
    return row === undefined ? null : PatientV1Z.parse(row);
  }

  getPatientByMrn(mrn: string): PatientV1 | null {
    const row = this.db.prepare(`select * from patients where mrn = ?`).get(mrn);
    return row === undefined ? null : PatientV1Z.parse(row);
  }

  insertPatient(input: PatientInputV1, created_at_ts: number): PatientV1 {
    const bmi = computeBmi(input.weight_kg, input.height_cm);
    const info = this.db
      .prepare(
        `insert into patients (mrn, full_name, age, weeks, weight_kg, height_cm, bmi, clinical_notes, created_at_ts)
         values (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(input.mrn, input.full_name, input.age, input.weeks, input.weight_kg, input.height_cm, bmi, input.clinical_notes, created_at_ts);
    return {
      id: Number(info.lastInsertRowid),
      mrn: input.mrn,
      full_name: input.full_name,
      age: input.age,
      weeks: input.weeks,
      weight_kg: input.weight_kg,
      height_cm: input.height_cm,
      bmi,
      clinical_notes: input.clinical_notes,
      created_at_ts,
    };
  }

  /**
   * Applies the demographic fields present in `changes` and recomputes BMI.
   * Returns the updated patient and the names of the fields that changed value.
   */
  updatePatient(
    id: number,
    changes: Omit<PatientUpdateRequestV1, "actor">
  ): { patient: PatientV1; changed: string[] } | null {
    const current = this.getPatient(id);
    if (!current) return null;

    const next: PatientV1 = {
      ...current,
      full_name: changes.full_name ?? current.full_name,
      age: changes.age ?? current.age,
      weeks: changes.weeks === undefined ? current.weeks : changes.weeks,
      weight_kg: changes.weight_kg === undefined ? current.weight_kg : changes.weight_kg,
      height_cm: changes.height_cm === undefined ? current.height_cm : changes.height_cm,
      clinical_notes: changes.clinical_notes ?? current.clinical_notes,
    };
    next.bmi = computeBmi(next.weight_kg, next.height_cm);

    const fields = ["full_name", "age", "weeks", "weight_kg", "height_cm", "clinical_notes"] as const;
    const changed = fields.filter((f) => next[f] !== current[f]);

    this.db
      .prepare(
        `update patients set full_name = ?, age = ?, weeks = ?, weight_kg = ?, height_cm = ?, bmi = ?, clinical_notes = ?
         where id = ?`
      )
      .run(next.full_name, next.age, next.weeks, next.weight_kg, next.height_cm, next.bmi, next.clinical_notes, id);
    return { patient: next, changed };
  }

  /** Deletes the patient and, by cascade, its results. Returns how many results went with it. */
  deletePatient(id: number): { patient: PatientV1; result_count: number } | null {
    const patient = this.getPatient(id);
    if (!patient) return null;
    const counted = CountRowZ.parse(this.db.prepare(`select null as k, count(*) as n from results where patient_id = ?`).get(id));
    this.db.prepare(`delete from patients where id = ?`).run(id);
    return { patient, result_count: counted.n };
  }

  // ---- results ----

  insertResult(r: NewResultV1): ResultRecordV1 {
    const info = this.db
      .prepare(
        `insert into results (patient_id, panel, test_number, qc_status, disposition, created_at_ts, created_by, record_json, qc_override_json)
         values (?, ?, ?, ?, ?, ?, ?, ?, null)`
      )
      .run(r.patient_id, r.panel, r.test_number, r.qc_status, r.disposition, r.created_at_ts, r.created_by, JSON.stringify(resultBody(r)));
    return { type: "result_record_v1", id: Number(info.lastInsertRowid), ...r, qc_override: null };
  }

  getResult(id: number): ResultRecordV1 | null {
    const row = this.db.prepare(`select * from results where id = ?`).get(id);
    return row === undefined ? null : this.toRecord(row);
  }

  listResults(args: { limit: number; patient_id?: number }): ResultRecordV1[] {
    const rows =
      args.patient_id === undefined
        ? this.db.prepare(`select * from results order by created_at_ts desc, id desc limit ?`).all(args.limit)
        : this.db
            .prepare(`select * from results where patient_id = ? order by created_at_ts desc, id desc limit ?`)
            .all(args.patient_id, args.limit);
    return rows.map((row) => this.toRecord(row));
  }

  /** Replaces the analysed content of a result; identity, owner and creation stamp stay. */
  updateResult(
    id: number,
    r: Omit<NewResultV1, "patient_id" | "created_at_ts" | "created_by">,
    qc_override: QcOverrideInfoV1 | null
  ): void {
    this.db
      .prepare(
        `update results set panel = ?, test_number = ?, qc_status = ?, disposition = ?, record_json = ?, qc_override_json = ?
         where id = ?`
      )
      .run(
        r.panel,
        r.test_number,
        r.qc_status,
        r.disposition,
        JSON.stringify(resultBody(r)),
        qc_override === null ? null : JSON.stringify(qc_override),
        id
      );
  }

  updateResultOverride(id: number, disposition: Disposition, qc_override: QcOverrideInfoV1 | null): void {
    this.db
      .prepare(`update results set disposition = ?, qc_override_json = ? where id = ?`)
      .run(disposition, qc_override === null ? null : JSON.stringify(qc_override), id);
  }

  deleteResult(id: number): boolean {
    return this.db.prepare(`delete from results where id = ?`).run(id).changes > 0;
  }

  private toRecord(raw: unknown): ResultRecordV1 {
    const row = ResultRowZ.parse(raw);
    const body = ResultBodyZ.parse(JSON.parse(row.record_json));
    return ResultRecordV1Z.parse({
      type: "result_record_v1",
      id: row.id,
      patient_id: row.patient_id,
      panel: row.panel,
      qc_status: row.qc_status,
      disposition: DispositionZ.parse(row.disposition),
      created_at_ts: row.created_at_ts,
      created_by: row.created_by,
      ...body,
      qc_override: row.qc_override_json === null ? null : QcOverrideInfoV1Z.parse(JSON.parse(row.qc_override_json)),
    });
  }

  // ---- audit ----

  insertAudit(entry: Omit<AuditEntryV1, "id">): void {
    this.db
      .prepare(`insert into audit_log (actor, action, details, at_ts) values (?, ?, ?, ?)`)
      .run(entry.actor, entry.action, entry.details, entry.at_ts);
  }

  listAudit(limit: number): AuditEntryV1[] {
    return this.db
      .prepare(`select * from audit_log order by at_ts desc, id desc limit ?`)
      .all(limit)
      .map((row) => AuditEntryV1Z.parse(row));
  }

  // ---- config revisions ----

  insertConfigRevision(args: {
    ssot_hash: string;
    parent_hash: string;
    actor: string;
    changed_paths: string[];
    config: ThresholdConfigV1;
    created_at_ts: number;
  }): number {
    const info = this.db
      .prepare(
        `insert into config_revisions (ssot_hash, parent_hash, actor, changed_paths_json, config_json, created_at_ts)
         values (?, ?, ?, ?, ?, ?)`
      )
      .run(args.ssot_hash, args.parent_hash, args.actor, JSON.stringify(args.changed_paths), JSON.stringify(args.config), args.created_at_ts);
    return Number(info.lastInsertRowid);
  }

  /** Latest committed revision; its `config` is unvalidated JSON. */
  latestConfigRevision(): ConfigRevisionV1 | null {
    const raw = this.db.prepare(`select * from config_revisions order by id desc limit 1`).get();
    if (raw === undefined) return null;
    const row = RevisionRowZ.parse(raw);
    return {
      id: row.id,
      ssot_hash: row.ssot_hash,
      parent_hash: row.parent_hash,
      actor: row.actor,
      changed_paths: z.array(z.string()).parse(JSON.parse(row.changed_paths_json)),
      config: JSON.parse(row.config_json),
      created_at_ts: row.created_at_ts,
    };
  }

  // ---- analytics ----

  private countBy(column: "qc_status" | "disposition" | "panel"): Record<string, number> {
    const out: Record<string, number> = {};
    const rows = this.db.prepare(`select ${column} as k, count(*) as n from results group by ${column} order by ${column}`).all();
    for (const raw of rows) {
      const row = CountRowZ.parse(raw);
      out[row.k ?? ""] = row.n;
    }
    return out;
  }

  private count(sql: string): number {
    return CountRowZ.parse(this.db.prepare(sql).get()).n;
  }

  analyticsSummary(): AnalyticsSummaryV1 {
    const total_results = this.count(`select null as k, count(*) as n from results`);
    const qc_status = this.countBy("qc_status");

    // Trisomy texts live in record_json.
    const positives = { t21: 0, t18: 0, t13: 0 };
    for (const r of this.listResults({ limit: Math.max(total_results, 1) })) {
      if (r.interpretation.trisomy["21"].risk_tier === "POSITIVE") positives.t21++;
      if (r.interpretation.trisomy["18"].risk_tier === "POSITIVE") positives.t18++;
      if (r.interpretation.trisomy["13"].risk_tier === "POSITIVE") positives.t13++;
    }

    return {
      total_results,
      total_patients: this.count(`select null as k, count(*) as n from patients`),
      qc_status,
      disposition: this.countBy("disposition"),
      panels: this.countBy("panel"),
      positives,
      qc_overrides: this.count(`select null as k, count(*) as n from results where qc_override_json is not null`),
      qc_pass_rate: total_results ? (qc_status.PASS ?? 0) / total_results : null,
    };
  }
}
