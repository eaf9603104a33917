// apps/server/src/config/ssot.ts
//
// Screening config SSOT / manifest helpers (manifest v1).
//
// Contract:
// - SSOT file: config/screening/default.json
// - ssot_hash: sha256(stableStringify(config)) with "sha256:" prefix
// - the manifest is the only source of editable paths

import fs from "node:fs";
import path from "node:path";

import { ThresholdConfigV1Z, type ThresholdConfigV1 } from "@nipt-console/contracts";
import { resolveThresholds } from "@nipt-console/screening-kernel";

import { findRepoRoot, isObj, nowMs, sha256Hex, stableStringify } from "../util";

export const SSOT_RELATIVE_PATH = "config/screening/default.json";

export type ManifestValueType = "number" | "bool" | "range";

export type ScreeningConfigEditableItem = {
  // Dot path shown to clients and matched verbatim by patch ops (e.g. "thresholds.cnv.2.>3.5").
  path: string;

  // Key segments actually written; CNV band keys contain dots.
  segments: string[];

  type: ManifestValueType;

  // Numeric constraints (number / range)
  min?: number;
  max?: number;

  description?: string;
};

export type ScreeningConfigManifestV1 = {
  ssot: {
    source: typeof SSOT_RELATIVE_PATH;
    schema_version: string;
    ssot_hash: string;
    // Latest committed config revision, null while the SSOT file is in force.
    revision: number | null;
    updated_at_ts: number;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: ScreeningConfigEditableItem[];
  defaults: Record<string, unknown>;
  read_only_hints: string[];
};

export function resolveRepoRoot(): string {
  if (process.env.SCREENING_REPO_ROOT) return path.resolve(process.env.SCREENING_REPO_ROOT);
  return findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH);
}

export function loadDefaultConfig(repoRoot: string = resolveRepoRoot()): ThresholdConfigV1 {
  const raw = fs.readFileSync(path.join(repoRoot, SSOT_RELATIVE_PATH), "utf8");
  return validateEffectiveConfig(JSON.parse(raw));
}

export function computeSsotHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

/**
 * Schema check plus band-ordering checks on the thresholds the kernel will actually use.
 * Throws Error("...") naming the first offending path.
 */
export function validateEffectiveConfig(input: unknown): ThresholdConfigV1 {
  const parsed = ThresholdConfigV1Z.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "invalid screening config");
  }

  const cfg = parsed.data;
  const r = resolveThresholds(cfg);

  if (!(r.qc.min_cff < r.qc.max_cff)) throw new Error("qc.min_cff must be below qc.max_cff");
  if (!(r.qc.gc_range[0] <= r.qc.gc_range[1])) throw new Error("qc.gc_range must be [min, max]");
  if (!(r.qc.qs_limit_negative <= r.qc.qs_limit_positive)) {
    throw new Error("qc.qs_limit_negative must not exceed qc.qs_limit_positive");
  }

  if (!(r.trisomy["1"].low <= r.trisomy["1"].ambiguous)) throw new Error("thresholds.trisomy.1: low must not exceed ambiguous");
  for (const it of ["2", "3"] as const) {
    const t = r.trisomy[it];
    if (!(t.low <= t.medium && t.medium <= t.high && t.high <= t.positive)) {
      throw new Error(`thresholds.trisomy.${it}: bands must ascend low <= medium <= high <= positive`);
    }
  }
  for (const it of ["1", "2", "3"] as const) {
    if (!(r.rat[it].low <= r.rat[it].positive)) throw new Error(`thresholds.rat.${it}: low must not exceed positive`);
  }

  return cfg;
}

function getPath(obj: unknown, segments: ReadonlyArray<string>): unknown {
  let cur: unknown = obj;
  for (const s of segments) {
    if (!isObj(cur)) return undefined;
    cur = cur[s];
  }
  return cur;
}

function item(
  segments: string[],
  type: ManifestValueType,
  range: { min?: number; max?: number } = {},
  description?: string
): ScreeningConfigEditableItem {
  return { path: segments.join("."), segments, type, ...range, description };
}

const Z_RANGE = { min: 0, max: 50 };
const PCT_RANGE = { min: 0, max: 100 };

function editableItems(cfg: ThresholdConfigV1): ScreeningConfigEditableItem[] {
  const resolved = resolveThresholds(cfg);
  const out: ScreeningConfigEditableItem[] = [
    item(["qc", "min_cff"], "number", { min: 0, max: 50 }, "Minimum fetal fraction (%)"),
    item(["qc", "max_cff"], "number", PCT_RANGE, "Maximum fetal fraction (%)"),
    item(["qc", "gc_range"], "range", PCT_RANGE, "Accepted GC content [min, max] (%)"),
    item(["qc", "min_unique_rate"], "number", PCT_RANGE, "Minimum unique read rate (%)"),
    item(["qc", "max_error_rate"], "number", PCT_RANGE, "Maximum sequencing error rate (%)"),
    item(["qc", "qs_limit_negative"], "number", { min: 0, max: 10 }, "Quality score ceiling, screen-negative samples"),
    item(["qc", "qs_limit_positive"], "number", { min: 0, max: 10 }, "Quality score ceiling, screen-positive samples"),
  ];

  for (const panel of Object.keys(resolved.panel_read_limits).sort()) {
    out.push(item(["panel_read_limits", panel], "number", { min: 0, max: 100 }, `Minimum reads (M) for ${panel}`));
  }

  out.push(item(["thresholds", "trisomy", "1", "low"], "number", Z_RANGE));
  out.push(item(["thresholds", "trisomy", "1", "ambiguous"], "number", Z_RANGE));
  for (const it of ["2", "3"]) {
    for (const k of ["low", "medium", "high", "positive"]) out.push(item(["thresholds", "trisomy", it, k], "number", Z_RANGE));
  }
  for (const it of ["1", "2", "3"]) {
    for (const k of ["xx_threshold", "xy_threshold"]) out.push(item(["thresholds", "sca", it, k], "number", Z_RANGE));
    for (const k of ["low", "positive"]) out.push(item(["thresholds", "rat", it, k], "number", Z_RANGE));
    for (const band of [">=10", ">7", ">3.5", "<=3.5"]) {
      out.push(item(["thresholds", "cnv", it, band], "number", PCT_RANGE, `CNV ratio threshold (%) for size band ${band} Mb`));
    }
  }

  out.push(item(["registry", "allow_alphanumeric_mrn"], "bool", {}, "Accept letters, '-' and '_' in MRNs"));
  return out;
}

export function getManifest(cfg: ThresholdConfigV1, revision: number | null = null): ScreeningConfigManifestV1 {
  const editable = editableItems(cfg);

  // Effective values: the snapshot where set, the kernel default otherwise.
  const effective = {
    ...resolveThresholds(cfg),
    registry: { allow_alphanumeric_mrn: cfg.registry?.allow_alphanumeric_mrn ?? false },
  };
  const defaults: Record<string, unknown> = {};
  for (const it of editable) {
    const own = getPath(cfg, it.segments);
    const fallback = it.segments[0] === "thresholds" ? getPath(effective, it.segments.slice(1)) : getPath(effective, it.segments);
    defaults[it.path] = own ?? fallback;
  }

  return {
    ssot: {
      source: SSOT_RELATIVE_PATH,
      schema_version: cfg.schema_version,
      ssot_hash: computeSsotHash(cfg),
      revision,
      updated_at_ts: nowMs(),
    },
    patch: {
      patch_version: "1.0.0",
      op_allowed: ["replace"],
      unknown_keys_policy: "reject",
    },
    editable,
    defaults,
    read_only_hints: ["schema_version"],
  };
}
