/**
 * Prospect ranking types — UI-independent, keyed by carrierId throughout.
 */

import { z } from "zod";
import { CargoTypeSchema, StateCodeSchema } from "@/domain/carrier/carrier.schema";
import type { CarrierRecord, RiskScore, RiskTier } from "@/domain/carrier/carrier.schema";
import { ScoringConfigSchema } from "@/domain/scoring/scoring.types";

/**
 * absolute: reuse scores computed against the full population.
 * relative: re-score against the filtered cohort (normalization is cohort-relative).
 */
export const ScoringModeSchema = z.enum(["absolute", "relative"]);
export type ScoringMode = z.infer<typeof ScoringModeSchema>;

/** Built per user interaction; never persisted. Unset fields impose no constraint. */
export const FilterCriteriaSchema = z
  .object({
    states: z.array(StateCodeSchema).optional(),
    fleetSizeMin: z.number().finite().min(0).optional(),
    fleetSizeMax: z.number().finite().min(0).optional(),
    safetyScoreMin: z.number().min(0).max(100).optional(),
    safetyScoreMax: z.number().min(0).max(100).optional(),
    cargoTypes: z.array(CargoTypeSchema).optional(),
    /** Drops prospects below this churn score (the dashboard's risk threshold). */
    minRiskScore: z.number().min(0).max(100).optional(),
    scoringMode: ScoringModeSchema.optional(),
    /** Used only when scoringMode is "relative". */
    scoringConfig: ScoringConfigSchema.optional(),
  })
  .strict();
export type FilterCriteria = z.infer<typeof FilterCriteriaSchema>;

export type RankedProspect = {
  /** 1-based (1 = highest churn risk). */
  rank: number;
  record: CarrierRecord;
  score: RiskScore;
};

export type ProspectKpi = {
  carrierCount: number;
  meanRiskScore: number;
  totalEstimatedSavings: number;
  meanFleetSize: number;
  criticalRiskCount: number;
  tierCounts: Record<RiskTier, number>;
  /** Share (0..1) of the population that made it through the filters; null without a population size. */
  marketPenetration: number | null;
};

export type StateSummary = {
  state: string;
  carrierCount: number;
  avgRiskScore: number;
  totalSavingsPotential: number;
  avgFleetSize: number;
  avgWagePercentile: number;
  avgOutOfServiceRate: number;
};
