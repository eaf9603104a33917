// apps/server/src/config/patch.ts
//
// Screening config patch (manifest v1).
//
// Contract:
// - replace-only ops
// - path must be in manifest.editable
// - unknown keys are rejected (static refusal)
// - ssot_hash mismatch is 409

import type { ThresholdConfigV1 } from "@nipt-console/contracts";

import { isObj } from "../util";
import { computeSsotHash, validateEffectiveConfig } from "./ssot";
import type { ScreeningConfigEditableItem, ScreeningConfigManifestV1 } from "./ssot";

export type ScreeningConfigPatchOpV1 = {
  op: "replace";
  path: string;
  value: unknown;
};

export type ScreeningConfigPatchV1 = {
  patch_version: "1.0.0";
  base: {
    ssot_hash: string;
  };
  ops: ScreeningConfigPatchOpV1[];
};

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "DUPLICATE_PATH"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class ScreeningConfigPatchRejected extends Error {
  public readonly status: number;
  public readonly errors: PatchValidationError[];
  public readonly ssot_hash: string | null;

  constructor(status: number, errors: PatchValidationError[], ssot_hash: string | null = null) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "ScreeningConfigPatchRejected";
    this.status = status;
    this.errors = errors;
    this.ssot_hash = ssot_hash;
  }
}

// Request wrapper used by POST /api/screening/config/patch.
export type PatchEnvelopeV1 = {
  base: { ssot_hash: string };
  patch: unknown;
  dryRun: boolean;
  actor: string;
};

export type PatchValue = number | boolean | [number, number];

export type ValidatedPatchOp = {
  item: ScreeningConfigEditableItem;
  value: PatchValue;
};

function unknownKeys(obj: Record<string, unknown>, allow: string[]): string[] {
  const s = new Set(allow);
  return Object.keys(obj).filter((k) => !s.has(k));
}

/**
 * Shape check of { base: { ssot_hash }, patch, dryRun?, actor? }.
 * dryRun defaults to true: a commit has to be asked for explicitly.
 */
export function readPatchEnvelope(input: unknown): PatchEnvelopeV1 {
  if (!isObj(input)) {
    throw new ScreeningConfigPatchRejected(400, [{ code: "INVALID_PATCH_SCHEMA", path: "", message: "body must be object" }]);
  }

  const errors: PatchValidationError[] = [];
  const uk = unknownKeys(input, ["base", "patch", "dryRun", "actor"]);
  if (uk.length) errors.push({ code: "UNKNOWN_KEYS", path: "", message: `unknown keys: ${uk.join(",")}` });

  let ssot_hash = "";
  const base = input.base;
  if (!isObj(base)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "base", message: "base must be object" });
  } else {
    const ukb = unknownKeys(base, ["ssot_hash"]);
    if (ukb.length) errors.push({ code: "UNKNOWN_KEYS", path: "base", message: `unknown keys: ${ukb.join(",")}` });
    if (typeof base.ssot_hash !== "string") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: "base.ssot_hash", message: "ssot_hash must be string" });
    } else {
      ssot_hash = base.ssot_hash;
    }
  }

  if (!isObj(input.patch)) errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" });

  const dryRun = input.dryRun;
  if (typeof dryRun !== "undefined" && typeof dryRun !== "boolean") {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "dryRun", message: "dryRun must be boolean" });
  }

  const actor = input.actor;
  if (typeof actor !== "undefined" && (typeof actor !== "string" || actor.trim() === "")) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "actor", message: "actor must be non-empty string" });
  }

  if (errors.length) throw new ScreeningConfigPatchRejected(400, errors);

  return {
    base: { ssot_hash },
    patch: input.patch,
    dryRun: typeof dryRun === "boolean" ? dryRun : true,
    actor: typeof actor === "string" ? actor.trim() : "system",
  };
}

function checkNumber(v: number, rule: ScreeningConfigEditableItem, at: string, errors: PatchValidationError[]): void {
  const meta = { min: rule.min, max: rule.max };
  if (typeof rule.min === "number" && v < rule.min) {
    errors.push({ code: "VALUE_OUT_OF_RANGE", path: at, message: "value below min", meta });
  }
  if (typeof rule.max === "number" && v > rule.max) {
    errors.push({ code: "VALUE_OUT_OF_RANGE", path: at, message: "value above max", meta });
  }
}

function readValue(v: unknown, rule: ScreeningConfigEditableItem, at: string, errors: PatchValidationError[]): PatchValue | null {
  if (rule.type === "bool") {
    if (typeof v !== "boolean") {
      errors.push({ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be boolean" });
      return null;
    }
    return v;
  }

  if (rule.type === "number") {
    if (typeof v !== "number" || !Number.isFinite(v)) {
      errors.push({ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be number" });
      return null;
    }
    checkNumber(v, rule, at, errors);
    return v;
  }

  // range: [min, max]
  if (!Array.isArray(v) || v.length !== 2) {
    errors.push({ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be [min, max]" });
    return null;
  }
  const lo: unknown = v[0];
  const hi: unknown = v[1];
  if (typeof lo !== "number" || typeof hi !== "number" || !Number.isFinite(lo) || !Number.isFinite(hi)) {
    errors.push({ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be [min, max]" });
    return null;
  }
  if (lo > hi) errors.push({ code: "VALUE_OUT_OF_RANGE", path: at, message: "range min above max" });
  checkNumber(lo, rule, at, errors);
  checkNumber(hi, rule, at, errors);
  return [lo, hi];
}

/**
 * Strict schema + allowlist validation. Returns the ops typed against their manifest entries.
 */
export function validatePatchStrict(
  patch: unknown,
  manifest: ScreeningConfigManifestV1
): { errors: PatchValidationError[]; ops: ValidatedPatchOp[] } {
  const errors: PatchValidationError[] = [];
  const ops: ValidatedPatchOp[] = [];

  if (!isObj(patch)) {
    return { errors: [{ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" }], ops };
  }

  const uk = unknownKeys(patch, ["patch_version", "base", "ops"]);
  if (uk.length) errors.push({ code: "UNKNOWN_KEYS", path: "patch", message: `unknown keys: ${uk.join(",")}` });

  if (patch.patch_version !== "1.0.0") {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.patch_version", message: "patch_version must be 1.0.0" });
  }

  const base = patch.base;
  if (!isObj(base)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base", message: "base must be object" });
  } else {
    const ukb = unknownKeys(base, ["ssot_hash"]);
    if (ukb.length) errors.push({ code: "UNKNOWN_KEYS", path: "patch.base", message: `unknown keys: ${ukb.join(",")}` });
  }

  const rawOps = patch.ops;
  if (!Array.isArray(rawOps) || rawOps.length === 0) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.ops", message: "ops must be non-empty array" });
    return { errors, ops };
  }

  const allowed = new Map<string, ScreeningConfigEditableItem>();
  for (const it of manifest.editable) allowed.set(it.path, it);
  const seen = new Set<string>();

  rawOps.forEach((op: unknown, i: number) => {
    const basePath = `patch.ops[${i}]`;
    if (!isObj(op)) {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: basePath, message: "op must be object" });
      return;
    }
    const uko = unknownKeys(op, ["op", "path", "value"]);
    if (uko.length) errors.push({ code: "UNKNOWN_KEYS", path: basePath, message: `unknown keys: ${uko.join(",")}` });

    if (op.op !== "replace") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.op`, message: "op must be replace" });
    }
    if (typeof op.path !== "string" || op.path.trim() === "") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.path`, message: "path must be string" });
      return;
    }
    const p = op.path.trim();
    const rule = allowed.get(p);
    if (!rule) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `${basePath}.path`, message: `path not allowed: ${p}` });
      return;
    }
    if (seen.has(p)) {
      errors.push({ code: "DUPLICATE_PATH", path: `${basePath}.path`, message: `path replaced twice: ${p}` });
      return;
    }
    seen.add(p);

    const value = readValue(op.value, rule, `${basePath}.value`, errors);
    if (value !== null) ops.push({ item: rule, value });
  });

  return { errors, ops };
}

function setPath(obj: Record<string, unknown>, segments: ReadonlyArray<string>, value: unknown): void {
  let cur = obj;
  for (const seg of segments.slice(0, -1)) {
    const next = cur[seg];
    if (isObj(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[seg] = created;
      cur = created;
    }
  }
  const last = segments[segments.length - 1];
  if (last !== undefined) cur[last] = value;
}

/**
 * Pure replace-only application on a deep copy; caller must validate first.
 */
export function applyPatch(cfg: ThresholdConfigV1, ops: ReadonlyArray<ValidatedPatchOp>): Record<string, unknown> {
  const out: unknown = structuredClone(cfg);
  if (!isObj(out)) throw new Error("screening config must be an object");
  for (const op of ops) setPath(out, op.item.segments, op.value);
  return out;
}

export type PreparedPatchV1 = {
  dryRun: boolean;
  actor: string;
  ssot_hash: string;
  effective: ThresholdConfigV1;
  effective_hash: string;
  changed_paths: string[];
};

/**
 * Full static pipeline for one patch request against the active config:
 * envelope -> ssot_hash (409) -> strict ops (400) -> apply -> effective config check (400).
 * Throws ScreeningConfigPatchRejected; never mutates `current`.
 */
export function preparePatch(input: unknown, current: ThresholdConfigV1, manifest: ScreeningConfigManifestV1): PreparedPatchV1 {
  const envelope = readPatchEnvelope(input);
  const ssot_hash = computeSsotHash(current);

  if (envelope.base.ssot_hash !== ssot_hash) {
    throw new ScreeningConfigPatchRejected(
      409,
      [
        {
          code: "SSOT_HASH_MISMATCH",
          path: "base.ssot_hash",
          message: `ssot_hash mismatch: got=${envelope.base.ssot_hash} expected=${ssot_hash}`,
        },
      ],
      ssot_hash
    );
  }

  // request.base.ssot_hash and patch.base.ssot_hash must agree.
  const patchBase = isObj(envelope.patch) && isObj(envelope.patch.base) ? envelope.patch.base.ssot_hash : undefined;
  if (patchBase !== ssot_hash) {
    throw new ScreeningConfigPatchRejected(
      409,
      [
        {
          code: "SSOT_HASH_MISMATCH",
          path: "patch.base.ssot_hash",
          message: `ssot_hash mismatch: got=${String(patchBase ?? "")} expected=${ssot_hash}`,
        },
      ],
      ssot_hash
    );
  }

  const { errors, ops } = validatePatchStrict(envelope.patch, manifest);
  if (errors.length) throw new ScreeningConfigPatchRejected(400, errors, ssot_hash);

  let effective: ThresholdConfigV1;
  try {
    effective = validateEffectiveConfig(applyPatch(current, ops));
  } catch (e: unknown) {
    throw new ScreeningConfigPatchRejected(
      400,
      [{ code: "INVALID_PATCH_SCHEMA", path: "", message: e instanceof Error ? e.message : String(e) }],
      ssot_hash
    );
  }

  return {
    dryRun: envelope.dryRun,
    actor: envelope.actor,
    ssot_hash,
    effective,
    effective_hash: computeSsotHash(effective),
    changed_paths: ops.map((op) => op.item.path).sort(),
  };
}
