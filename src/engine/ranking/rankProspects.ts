/**
 * Deterministic prospect ranking (pure function).
 * Tie-breakers (in order): churnRiskScore desc → estimatedAnnualSavings desc → carrierId asc.
 */

import type { CarrierRecord, RiskScore, RiskScoreMap } from "@/domain/carrier/carrier.schema";
import type { FilterCriteria, RankedProspect } from "@/domain/prospect/prospect.types";
import { DEFAULT_SCORING_CONFIG } from "@/config/scoringDefaults";
import { score } from "@/engine/scoring";
import { emptyCohort, invalidParameter } from "@/lib/errors";
import { dlog, dwarn } from "@/lib/debug";
import { filterCarriers, validateCriteria } from "./filterCarriers";

type Pair = { record: CarrierRecord; score: RiskScore };

export function compareProspects(a: Pair, b: Pair): number {
  if (b.score.churnRiskScore !== a.score.churnRiskScore) {
    return b.score.churnRiskScore - a.score.churnRiskScore;
  }
  if (b.score.estimatedAnnualSavings !== a.score.estimatedAnnualSavings) {
    return b.score.estimatedAnnualSavings - a.score.estimatedAnnualSavings;
  }
  // code-unit order
  if (a.record.carrierId < b.record.carrierId) return -1;
  if (a.record.carrierId > b.record.carrierId) return 1;
  return 0;
}

function attachScores(records: readonly CarrierRecord[], scores: RiskScoreMap): Pair[] {
  return records.map((record) => {
    const s = scores.get(record.carrierId);
    if (!s) throw invalidParameter(`No score for carrier ${record.carrierId}`, { carrierId: record.carrierId });
    return { record, score: s };
  });
}

/**
 * Filters, (optionally) re-scores and orders carriers, then assigns rank 1, 2, 3, ...
 * absolute mode reuses `scores`; relative mode re-scores the filtered cohort so
 * normalization reflects only the carriers on screen.
 */
export function rank(
  records: readonly CarrierRecord[],
  scores: RiskScoreMap,
  criteria: FilterCriteria = {}
): RankedProspect[] {
  const c = validateCriteria(criteria);
  if (records.length === 0) throw emptyCohort();

  const filtered = filterCarriers(records, c);
  const mode = c.scoringMode ?? "absolute";
  if (mode === "absolute" && c.scoringConfig) {
    dwarn("[rank] scoringConfig is only applied in relative mode; using precomputed scores");
  }
  if (filtered.length === 0) {
    dlog("[rank] no carriers match", { mode });
    return [];
  }

  const effective = mode === "relative" ? score(filtered, c.scoringConfig ?? DEFAULT_SCORING_CONFIG) : scores;
  const minRisk = c.minRiskScore;

  const ranked = attachScores(filtered, effective)
    .filter((p) => minRisk === undefined || p.score.churnRiskScore >= minRisk)
    .sort(compareProspects)
    .map((p, i) => ({ rank: i + 1, record: p.record, score: p.score }));

  dlog("[rank] prospects", { mode, input: records.length, filtered: filtered.length, ranked: ranked.length });
  return ranked;
}

/** Largest savings opportunities first (ties keep churn order). */
export function topSavingsProspects(prospects: readonly RankedProspect[], limit: number): RankedProspect[] {
  if (!Number.isInteger(limit) || limit < 0) throw invalidParameter("limit must be a non-negative integer", { limit });
  return [...prospects]
    .sort((a, b) => b.score.estimatedAnnualSavings - a.score.estimatedAnnualSavings || a.rank - b.rank)
    .slice(0, limit);
}
