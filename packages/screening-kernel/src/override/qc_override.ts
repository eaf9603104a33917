// Screening Kernel - QC override transitions (v1)
//
// Contract:
// - Pure: takes an override state, returns a new one. The store persists it.
// - Applying recomputes the disposition from the stored result texts, never
//   from a fresh analysis run.
// - Removing restores the disposition in force before the override, or
//   INVALID_QC_FAIL while the stored QC status is still FAIL.

import type { Disposition, QcOverrideInfoV1, QcStatus } from "@nipt-console/contracts";

export type OverrideErrorCode = "OVERRIDE_REASON_REQUIRED" | "OVERRIDE_ALREADY_APPLIED" | "OVERRIDE_NOT_APPLIED";

export class QcOverrideRejected extends Error {
  code: OverrideErrorCode;

  constructor(code: OverrideErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "QcOverrideRejected";
    this.code = code;
  }
}

export type QcOverrideStateV1 = {
  qc_status: QcStatus;
  disposition: Disposition;
  qc_override: QcOverrideInfoV1 | null;
  // Four main result texts: T21, T18, T13, SCA.
  texts: ReadonlyArray<string>;
  cnv_count: number;
  rat_count: number;
};

export type QcOverrideRequest = { reason: string; actor: string; at_ts: number };

export function recomputeDispositionFromTexts(texts: ReadonlyArray<string>, cnvCount: number, ratCount: number): Disposition {
  const upper = texts.map((t) => t.toUpperCase());
  if (upper.some((t) => t.includes("POSITIVE"))) return "POSITIVE";

  const flagged = upper.some((t) => t.includes("HIGH") || t.includes("RE-LIBRARY") || t.includes("RESAMPLE"));
  if (flagged || cnvCount > 0 || ratCount > 0) return "HIGH_RISK";
  return "NEGATIVE";
}

export function applyQcOverride(state: QcOverrideStateV1, req: QcOverrideRequest): QcOverrideStateV1 {
  const reason = req.reason.trim();
  if (!reason) throw new QcOverrideRejected("OVERRIDE_REASON_REQUIRED", "a reason is required to override QC");
  if (state.qc_override) throw new QcOverrideRejected("OVERRIDE_ALREADY_APPLIED", "QC override already applied");

  return {
    ...state,
    disposition: recomputeDispositionFromTexts(state.texts, state.cnv_count, state.rat_count),
    qc_override: { reason, actor: req.actor, at_ts: req.at_ts, prior_disposition: state.disposition },
  };
}

export function removeQcOverride(state: QcOverrideStateV1): QcOverrideStateV1 {
  const info = state.qc_override;
  if (!info) throw new QcOverrideRejected("OVERRIDE_NOT_APPLIED", "no QC override to remove");

  return {
    ...state,
    disposition: state.qc_status === "FAIL" ? "INVALID_QC_FAIL" : info.prior_disposition,
    qc_override: null,
  };
}

/** PASS while an override is in force, the stored status otherwise. */
export function effectiveQcStatus(state: Pick<QcOverrideStateV1, "qc_status" | "qc_override">): QcStatus {
  return state.qc_override ? "PASS" : state.qc_status;
}
