import type { ClassificationResult, ReportDirective, RiskTier, TestIteration } from "@nipt-console/contracts";

/**
 * Builds an immutable ClassificationResult.
 */
export function makeResult(result_text: string, risk_tier: RiskTier, directive: ReportDirective): ClassificationResult {
  return Object.freeze({ result_text, risk_tier, directive });
}

export function retestLabel(iteration: 2 | 3): string {
  return iteration === 2 ? "2nd test" : "3rd test";
}

export function formatZ(z: number): string {
  return z.toFixed(2);
}

export function isRetest(iteration: TestIteration): iteration is 2 | 3 {
  return iteration !== 1;
}
