import assert from "node:assert";
import { describe, it } from "node:test";

import type { ThresholdConfigV1 } from "@nipt-console/contracts";
import { resolveThresholds, snapshotConfig } from "@nipt-console/screening-kernel";

import { ScreeningConfigPatchRejected, preparePatch } from "../config/patch";
import { SSOT_RELATIVE_PATH, computeSsotHash, getManifest, loadDefaultConfig } from "../config/ssot";
import { findRepoRoot } from "../util";

const ssot = snapshotConfig(loadDefaultConfig(findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH)));
const hash = computeSsotHash(ssot);

function body(ops: unknown[], extra: Record<string, unknown> = {}) {
  return { base: { ssot_hash: hash }, patch: { patch_version: "1.0.0", base: { ssot_hash: hash }, ops }, ...extra };
}

function rejected(status: number, code: string, message?: string) {
  return (err: unknown) =>
    err instanceof ScreeningConfigPatchRejected &&
    err.status === status &&
    err.errors.some((e) => e.code === code && (message === undefined || e.message === message));
}

describe("screening config SSOT", () => {
  it("encodes the same table as the kernel defaults", () => {
    const empty: ThresholdConfigV1 = { schema_version: "1.0.0" };
    assert.deepStrictEqual(resolveThresholds(ssot), resolveThresholds(empty));
  });

  it("hashes independently of key order", () => {
    assert.strictEqual(computeSsotHash({ a: 1, b: { c: 2, d: 3 } }), computeSsotHash({ b: { d: 3, c: 2 }, a: 1 }));
    assert.ok(hash.startsWith("sha256:"));
  });

  it("manifest lists editable paths with effective values", () => {
    const m = getManifest(ssot);
    const paths = m.editable.map((e) => e.path);
    assert.ok(paths.includes("thresholds.cnv.2.>3.5"));
    assert.ok(paths.includes("panel_read_limits.NIPT Pro"));
    assert.strictEqual(m.ssot.ssot_hash, hash);
    assert.strictEqual(m.ssot.revision, null);
    assert.strictEqual(m.defaults["thresholds.trisomy.2.medium"], 3);

    const sparse = getManifest({ schema_version: "1.0.0" });
    assert.strictEqual(sparse.defaults["qc.min_cff"], 3.5);
    assert.strictEqual(sparse.defaults["thresholds.cnv.1.<=3.5"], 12);
    assert.strictEqual(sparse.defaults["registry.allow_alphanumeric_mrn"], false);
  });
});

describe("preparePatch", () => {
  it("applies replace ops to a copy", () => {
    const out = preparePatch(
      body([
        { op: "replace", path: "thresholds.cnv.2.>3.5", value: 9.5 },
        { op: "replace", path: "qc.gc_range", value: [36, 45] },
      ]),
      ssot,
      getManifest(ssot)
    );
    assert.strictEqual(out.dryRun, true);
    assert.strictEqual(out.actor, "system");
    assert.deepStrictEqual(out.changed_paths, ["qc.gc_range", "thresholds.cnv.2.>3.5"]);
    assert.strictEqual(out.effective.thresholds?.cnv?.["2"]?.[">3.5"], 9.5);
    assert.deepStrictEqual(out.effective.qc?.gc_range, [36, 45]);
    assert.strictEqual(ssot.thresholds?.cnv?.["2"]?.[">3.5"], 10);
    assert.notStrictEqual(out.effective_hash, hash);
  });

  it("rejects a stale ssot_hash with 409", () => {
    const stale = { base: { ssot_hash: "sha256:stale" }, patch: { patch_version: "1.0.0", base: { ssot_hash: "sha256:stale" }, ops: [] } };
    assert.throws(() => preparePatch(stale, ssot, getManifest(ssot)), rejected(409, "SSOT_HASH_MISMATCH"));
  });

  it("rejects paths outside the manifest and unknown keys", () => {
    const m = getManifest(ssot);
    assert.throws(() => preparePatch(body([{ op: "replace", path: "schema_version", value: "2.0.0" }]), ssot, m), rejected(400, "PATH_NOT_ALLOWED"));
    assert.throws(
      () => preparePatch(body([{ op: "replace", path: "qc.min_cff", value: 4, note: "x" }]), ssot, m),
      rejected(400, "UNKNOWN_KEYS")
    );
    assert.throws(() => preparePatch(body([], { force: true }), ssot, m), rejected(400, "UNKNOWN_KEYS"));
  });

  it("checks value types and ranges", () => {
    const m = getManifest(ssot);
    assert.throws(() => preparePatch(body([{ op: "replace", path: "qc.min_cff", value: "4" }]), ssot, m), rejected(400, "VALUE_TYPE_MISMATCH"));
    assert.throws(() => preparePatch(body([{ op: "replace", path: "qc.min_cff", value: 80 }]), ssot, m), rejected(400, "VALUE_OUT_OF_RANGE", "value above max"));
    assert.throws(
      () => preparePatch(body([{ op: "replace", path: "qc.gc_range", value: [44, 37] }]), ssot, m),
      rejected(400, "VALUE_OUT_OF_RANGE", "range min above max")
    );
    assert.throws(
      () => preparePatch(body([{ op: "replace", path: "registry.allow_alphanumeric_mrn", value: 1 }]), ssot, m),
      rejected(400, "VALUE_TYPE_MISMATCH", "value must be boolean")
    );
    assert.throws(() => preparePatch(body([], { dryRun: "no" }), ssot, m), rejected(400, "INVALID_PATCH_SCHEMA"));
  });

  it("rejects an effective config whose bands do not ascend", () => {
    assert.throws(
      () => preparePatch(body([{ op: "replace", path: "thresholds.trisomy.2.medium", value: 5 }]), ssot, getManifest(ssot)),
      rejected(400, "INVALID_PATCH_SCHEMA", "thresholds.trisomy.2: bands must ascend low <= medium <= high <= positive")
    );
  });
});
