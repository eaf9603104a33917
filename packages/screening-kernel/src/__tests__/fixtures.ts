import type { SampleInputV1, SampleMetricsV1, ThresholdConfigV1 } from "@nipt-console/contracts";

// Sparse snapshot: every threshold comes from the accessor defaults.
export const EMPTY_CFG: ThresholdConfigV1 = { schema_version: "1.0.0" };

export const CLEAN_METRICS: SampleMetricsV1 = {
  panel: "NIPT Standard",
  reads: 10,
  cff: 8,
  gc: 40,
  qs: 1.0,
  unique_rate: 80,
  error_rate: 0.2,
};

export function sampleInput(over: Partial<SampleInputV1> = {}): SampleInputV1 {
  return {
    metrics: CLEAN_METRICS,
    z_scores: { "21": 0.5, "18": -0.3, "13": 1.1, XX: 0.2, XY: -0.1 },
    sca_type: "XX",
    cnv: [],
    rat: [],
    test_number: 1,
    ...over,
  };
}
