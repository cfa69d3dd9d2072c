import type { SavingsModel } from "@/domain/scoring/scoring.types";

/**
 * Annual turnover cost the retention programme would recover for one carrier.
 * Scales linearly with fleet size; the churn multiplier rises with the score
 * around the pivot and never goes below zero. Whole dollars.
 */
export function estimateAnnualSavings(fleetSize: number, churnRiskScore: number, model: SavingsModel): number {
  const churnMultiplier = Math.max(0, 1 + (churnRiskScore - model.riskPivot) * model.riskSlope);
  const drivers = fleetSize * model.driversPerPowerUnit;
  const savings = drivers * model.replacementCostPerDriver * churnMultiplier * model.retentionImprovement;
  return Number.isFinite(savings) && savings > 0 ? Math.round(savings) : 0;
}
