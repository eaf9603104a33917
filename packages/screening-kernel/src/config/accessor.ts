// Screening Kernel - threshold accessor (v1)
//
// The one place that encodes the default decision table. Every classifier reads
// thresholds through these getters; a missing key anywhere in the snapshot falls
// back to its default rather than failing.

import type { CnvBand, TestIteration, ThresholdConfigV1 } from "@nipt-console/contracts";

export type ResolvedQcThresholds = {
  min_cff: number;
  max_cff: number;
  gc_range: readonly [number, number];
  min_unique_rate: number;
  max_error_rate: number;
  qs_limit_negative: number;
  qs_limit_positive: number;
};

export type TrisomyFirstTestThresholds = { low: number; ambiguous: number };
export type TrisomyRetestThresholds = { low: number; medium: number; high: number; positive: number };
export type ScaThresholds = { xx_threshold: number; xy_threshold: number };
export type RatThresholds = { low: number; positive: number };
export type CnvThresholds = Record<CnvBand, number>;

export const DEFAULT_QC_THRESHOLDS: Readonly<ResolvedQcThresholds> = Object.freeze({
  min_cff: 3.5,
  max_cff: 50.0,
  gc_range: [37.0, 44.0] as const,
  min_unique_rate: 68.0,
  max_error_rate: 1.0,
  qs_limit_negative: 1.7,
  qs_limit_positive: 2.0,
});

export const DEFAULT_PANEL_READ_LIMITS: Readonly<Record<string, number>> = Object.freeze({
  "NIPT Basic": 5,
  "NIPT Standard": 7,
  "NIPT Plus": 12,
  "NIPT Pro": 20,
});

// Panels missing from both the snapshot and the table above.
export const FALLBACK_MIN_READS = 5;

const DEFAULT_TRISOMY_FIRST: Readonly<TrisomyFirstTestThresholds> = Object.freeze({ low: 2.58, ambiguous: 6.0 });
const DEFAULT_TRISOMY_RETEST: Readonly<TrisomyRetestThresholds> = Object.freeze({ low: 2.58, medium: 3.0, high: 4.0, positive: 6.0 });
const DEFAULT_SCA: Readonly<ScaThresholds> = Object.freeze({ xx_threshold: 4.5, xy_threshold: 6.0 });
const DEFAULT_RAT: Readonly<RatThresholds> = Object.freeze({ low: 4.5, positive: 8.0 });
const DEFAULT_CNV: Readonly<CnvThresholds> = Object.freeze({ ">=10": 6.0, ">7": 8.0, ">3.5": 10.0, "<=3.5": 12.0 });

function iterationKey(iteration: TestIteration): "1" | "2" | "3" {
  if (iteration === 1) return "1";
  return iteration === 2 ? "2" : "3";
}

export function qcThresholds(cfg: ThresholdConfigV1): ResolvedQcThresholds {
  const qc = cfg.qc;
  const d = DEFAULT_QC_THRESHOLDS;
  return {
    min_cff: qc?.min_cff ?? d.min_cff,
    max_cff: qc?.max_cff ?? d.max_cff,
    gc_range: qc?.gc_range ?? d.gc_range,
    min_unique_rate: qc?.min_unique_rate ?? d.min_unique_rate,
    max_error_rate: qc?.max_error_rate ?? d.max_error_rate,
    qs_limit_negative: qc?.qs_limit_negative ?? d.qs_limit_negative,
    qs_limit_positive: qc?.qs_limit_positive ?? d.qs_limit_positive,
  };
}

// Own keys only: a panel named after an Object.prototype member is just an unknown panel.
function ownLimit(table: Readonly<Record<string, number>> | undefined, panel: string): number | undefined {
  if (!table || !Object.hasOwn(table, panel)) return undefined;
  const v = table[panel];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function panelMinReads(cfg: ThresholdConfigV1, panel: string): number {
  return ownLimit(cfg.panel_read_limits, panel) ?? ownLimit(DEFAULT_PANEL_READ_LIMITS, panel) ?? FALLBACK_MIN_READS;
}

export function trisomyFirstTestThresholds(cfg: ThresholdConfigV1): TrisomyFirstTestThresholds {
  const t = cfg.thresholds?.trisomy?.["1"];
  return {
    low: t?.low ?? DEFAULT_TRISOMY_FIRST.low,
    ambiguous: t?.ambiguous ?? DEFAULT_TRISOMY_FIRST.ambiguous,
  };
}

export function trisomyRetestThresholds(cfg: ThresholdConfigV1, iteration: 2 | 3): TrisomyRetestThresholds {
  const t = cfg.thresholds?.trisomy?.[iteration === 2 ? "2" : "3"];
  return {
    low: t?.low ?? DEFAULT_TRISOMY_RETEST.low,
    medium: t?.medium ?? DEFAULT_TRISOMY_RETEST.medium,
    high: t?.high ?? DEFAULT_TRISOMY_RETEST.high,
    positive: t?.positive ?? DEFAULT_TRISOMY_RETEST.positive,
  };
}

export function scaThresholds(cfg: ThresholdConfigV1, iteration: TestIteration): ScaThresholds {
  const t = cfg.thresholds?.sca?.[iterationKey(iteration)];
  return {
    xx_threshold: t?.xx_threshold ?? DEFAULT_SCA.xx_threshold,
    xy_threshold: t?.xy_threshold ?? DEFAULT_SCA.xy_threshold,
  };
}

export function ratThresholds(cfg: ThresholdConfigV1, iteration: TestIteration): RatThresholds {
  const t = cfg.thresholds?.rat?.[iterationKey(iteration)];
  return {
    low: t?.low ?? DEFAULT_RAT.low,
    positive: t?.positive ?? DEFAULT_RAT.positive,
  };
}

export function cnvThresholds(cfg: ThresholdConfigV1, iteration: TestIteration): CnvThresholds {
  const t = cfg.thresholds?.cnv?.[iterationKey(iteration)];
  return {
    ">=10": t?.[">=10"] ?? DEFAULT_CNV[">=10"],
    ">7": t?.[">7"] ?? DEFAULT_CNV[">7"],
    ">3.5": t?.[">3.5"] ?? DEFAULT_CNV[">3.5"],
    "<=3.5": t?.["<=3.5"] ?? DEFAULT_CNV["<=3.5"],
  };
}

export type ResolvedThresholdsV1 = {
  qc: ResolvedQcThresholds;
  panel_read_limits: Record<string, number>;
  trisomy: { "1": TrisomyFirstTestThresholds; "2": TrisomyRetestThresholds; "3": TrisomyRetestThresholds };
  sca: Record<"1" | "2" | "3", ScaThresholds>;
  rat: Record<"1" | "2" | "3", RatThresholds>;
  cnv: Record<"1" | "2" | "3", CnvThresholds>;
};

/**
 * Fully-populated view of a (possibly sparse) snapshot: what the classifiers will actually use.
 */
export function resolveThresholds(cfg: ThresholdConfigV1): ResolvedThresholdsV1 {
  return {
    qc: qcThresholds(cfg),
    panel_read_limits: { ...DEFAULT_PANEL_READ_LIMITS, ...(cfg.panel_read_limits ?? {}) },
    trisomy: { "1": trisomyFirstTestThresholds(cfg), "2": trisomyRetestThresholds(cfg, 2), "3": trisomyRetestThresholds(cfg, 3) },
    sca: { "1": scaThresholds(cfg, 1), "2": scaThresholds(cfg, 2), "3": scaThresholds(cfg, 3) },
    rat: { "1": ratThresholds(cfg, 1), "2": ratThresholds(cfg, 2), "3": ratThresholds(cfg, 3) },
    cnv: { "1": cnvThresholds(cfg, 1), "2": cnvThresholds(cfg, 2), "3": cnvThresholds(cfg, 3) },
  };
}

/**
 * Deep-frozen copy of a snapshot. Config commits replace the snapshot; they never mutate one.
 */
export function snapshotConfig(cfg: ThresholdConfigV1): ThresholdConfigV1 {
  return deepFreeze(structuredClone(cfg));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}
