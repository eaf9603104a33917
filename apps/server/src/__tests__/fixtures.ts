import type { SampleInputV1 } from "@nipt-console/contracts";

import { sampleInput } from "../../../../packages/screening-kernel/src/__tests__/fixtures";

export { CLEAN_METRICS, sampleInput } from "../../../../packages/screening-kernel/src/__tests__/fixtures";

export function saveBody(
  over: { mrn?: string; age?: number; sample?: Partial<SampleInputV1>; allow_duplicate?: boolean } = {}
): Record<string, unknown> {
  return {
    patient: {
      mrn: over.mrn ?? "123456",
      full_name: "Test Patient",
      age: over.age ?? 32,
      weeks: 12,
      weight_kg: 65,
      height_cm: 165,
    },
    sample: sampleInput(over.sample),
    allow_duplicate: over.allow_duplicate,
    actor: "tech.test",
  };
}
