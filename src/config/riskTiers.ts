/**
 * Churn score tiers used for colouring and the critical-carrier KPI.
 * normal < 50, watch 50–64, high 65–74, critical >= 75.
 */

import type { RiskTier } from "@/domain/carrier/carrier.schema";

export const riskTierThresholds = {
  watchMin: 50,
  highMin: 65,
  criticalMin: 75,
} as const;


/**
 * Returns the tier for a churn score (0–100).
 */
export function getRiskTier(score: number): RiskTier {
  const s = Number(score);
  if (!Number.isFinite(s)) return "normal";
  if (s >= riskTierThresholds.criticalMin) return "critical";
  if (s >= riskTierThresholds.highMin) return "high";
  if (s >= riskTierThresholds.watchMin) return "watch";
  return "normal";
}
