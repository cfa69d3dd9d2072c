/**
 * Scoring configuration — passed explicitly to the engine, never held as module state.
 */

import { z } from "zod";

export const WEIGHT_SUM_TOLERANCE = 1e-9;

const WeightSchema = z.number().finite().min(0).max(1);

const sumsToOne = (w: Record<string, number>) =>
  Math.abs(Object.values(w).reduce((a, b) => a + b, 0) - 1) <= WEIGHT_SUM_TOLERANCE;

/** Composite weights: risk = safety·(1 - normSafety) + wage·(1 - normWage) + fleet·fleetAdjustment. */
export const ScoringWeightsSchema = z
  .object({ safety: WeightSchema, wage: WeightSchema, fleet: WeightSchema })
  .strict()
  .refine(sumsToOne, { message: "Scoring weights must sum to 1" });
export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

/** Blend of normalized fleet-profile factors making up the fleet risk adjustment. */
export const FleetProfileWeightsSchema = z
  .object({ outOfService: WeightSchema, crash: WeightSchema, violationsPerUnit: WeightSchema })
  .strict()
  .refine(sumsToOne, { message: "Fleet profile weights must sum to 1" });
export type FleetProfileWeights = z.infer<typeof FleetProfileWeightsSchema>;

export const SavingsModelSchema = z
  .object({
    /** Cost to recruit and onboard one replacement driver ($). */
    replacementCostPerDriver: z.number().finite().min(0),
    driversPerPowerUnit: z.number().finite().positive(),
    /** Share of turnover cost the retention programme recovers (0..1). */
    retentionImprovement: z.number().min(0).max(1),
    /** Churn score at which the churn multiplier is 1. */
    riskPivot: z.number().min(0).max(100),
    /** Change in churn multiplier per score point. */
    riskSlope: z.number().finite().min(0),
  })
  .strict();
export type SavingsModel = z.infer<typeof SavingsModelSchema>;

export const ScoringConfigSchema = z
  .object({
    weights: ScoringWeightsSchema,
    fleetProfileWeights: FleetProfileWeightsSchema,
    savings: SavingsModelSchema,
  })
  .strict();
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export type FactorBounds = { min: number; max: number };

/** Cohort-wide min/max per raw factor; the reduction completed before any record is scored. */
export type CohortBounds = {
  safetyScore: FactorBounds;
  wagePercentile: FactorBounds;
  outOfServiceRate: FactorBounds;
  crashRate: FactorBounds;
  violationsPerUnit: FactorBounds;
};
