import type { ScoringConfig, ScoringWeights, FleetProfileWeights, SavingsModel } from "@/domain/scoring/scoring.types";

/** Default composite weights (safety, wage, fleet). */
export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  safety: 0.5,
  wage: 0.3,
  fleet: 0.2,
};

export const DEFAULT_FLEET_PROFILE_WEIGHTS: FleetProfileWeights = {
  outOfService: 0.4,
  crash: 0.4,
  violationsPerUnit: 0.2,
};

/**
 * Savings assumptions (tunable). $25k per replacement driver and a 40% turnover
 * reduction are sales-deck figures, not audited constants.
 */
export const DEFAULT_SAVINGS_MODEL: SavingsModel = {
  replacementCostPerDriver: 25_000,
  driversPerPowerUnit: 1,
  retentionImprovement: 0.4,
  riskPivot: 50,
  riskSlope: 0.01,
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: DEFAULT_SCORING_WEIGHTS,
  fleetProfileWeights: DEFAULT_FLEET_PROFILE_WEIGHTS,
  savings: DEFAULT_SAVINGS_MODEL,
};

/** Normalized value used when a factor has no spread across the cohort. */
export const NEUTRAL_NORMALIZED = 0.5;
