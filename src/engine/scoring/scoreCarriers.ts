/**
 * Churn-risk scoring engine (pure functions only). No ranking, no filtering.
 *
 * Phase 1 reduces the cohort to min/max bounds per factor; phase 2 scores each
 * record against those fixed bounds. Nothing random, and the bounds do not depend
 * on record order, so the same cohort always yields the same scores.
 */

import type { CarrierRecord, ComponentScores, RiskScore } from "@/domain/carrier/carrier.schema";
import type { CohortBounds, ScoringConfig } from "@/domain/scoring/scoring.types";
import { DEFAULT_SCORING_CONFIG } from "@/config/scoringDefaults";
import { getRiskTier } from "@/config/riskTiers";
import { clamp, clamp01 } from "@/lib/math";
import { dlog } from "@/lib/debug";
import { computeCohortBounds, normalizeMinMax, violationsPerUnit } from "./normalize";
import { estimateAnnualSavings } from "./savings";
import { validateCohort, validateScoringConfig } from "./validate";

export function computeComponentScores(
  record: CarrierRecord,
  bounds: CohortBounds,
  config: ScoringConfig
): ComponentScores {
  const fw = config.fleetProfileWeights;
  const fleet =
    fw.outOfService * normalizeMinMax(record.outOfServiceRate, bounds.outOfServiceRate) +
    fw.crash * normalizeMinMax(record.crashRate, bounds.crashRate) +
    fw.violationsPerUnit * normalizeMinMax(violationsPerUnit(record), bounds.violationsPerUnit);

  return {
    safety: clamp01(1 - normalizeMinMax(record.safetyScore, bounds.safetyScore)),
    wage: clamp01(1 - normalizeMinMax(record.wagePercentile, bounds.wagePercentile)),
    fleet: clamp01(fleet),
  };
}

/** Scores one record against precomputed cohort bounds. */
export function scoreRecord(record: CarrierRecord, bounds: CohortBounds, config: ScoringConfig): RiskScore {
  const componentScores = computeComponentScores(record, bounds, config);
  const w = config.weights;
  const composite = w.safety * componentScores.safety + w.wage * componentScores.wage + w.fleet * componentScores.fleet;
  const churnRiskScore = clamp(composite * 100, 0, 100);

  return {
    carrierId: record.carrierId,
    churnRiskScore,
    estimatedAnnualSavings: estimateAnnualSavings(record.fleetSize, churnRiskScore, config.savings),
    componentScores,
    riskTier: getRiskTier(churnRiskScore),
  };
}

/**
 * Score a cohort. Keys follow input order.
 * Throws EmptyCohort for [] and InvalidParameter for bad records or config.
 */
export function score(
  records: readonly CarrierRecord[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): Map<string, RiskScore> {
  validateCohort(records);
  const resolved = validateScoringConfig(config);

  const bounds = computeCohortBounds(records);
  const scores = new Map<string, RiskScore>();
  for (const record of records) {
    scores.set(record.carrierId, scoreRecord(record, bounds, resolved));
  }

  dlog("[score] cohort", { size: records.length, bounds });
  return scores;
}
