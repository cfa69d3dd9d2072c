/**
 * Top-line KPIs and per-state rollups over a ranked prospect list.
 */

import type { RiskTier } from "@/domain/carrier/carrier.schema";
import type { ProspectKpi, RankedProspect, StateSummary } from "@/domain/prospect/prospect.types";
import { mean, sum } from "@/lib/math";
import { invalidParameter } from "@/lib/errors";

export type SummarizeOptions = {
  /** Size of the unfiltered population, for market penetration. */
  populationSize?: number;
};

function emptyTierCounts(): Record<RiskTier, number> {
  return { normal: 0, watch: 0, high: 0, critical: 0 };
}

export function summarize(prospects: readonly RankedProspect[], options: SummarizeOptions = {}): ProspectKpi {
  const { populationSize } = options;
  if (populationSize !== undefined && (!Number.isInteger(populationSize) || populationSize < 0)) {
    throw invalidParameter("populationSize must be a non-negative integer", { populationSize });
  }
  if (populationSize !== undefined && populationSize < prospects.length) {
    throw invalidParameter("populationSize is smaller than the prospect list", {
      populationSize,
      carrierCount: prospects.length,
    });
  }

  const tierCounts = emptyTierCounts();
  for (const p of prospects) tierCounts[p.score.riskTier] += 1;

  return {
    carrierCount: prospects.length,
    meanRiskScore: mean(prospects.map((p) => p.score.churnRiskScore)),
    totalEstimatedSavings: sum(prospects.map((p) => p.score.estimatedAnnualSavings)),
    meanFleetSize: mean(prospects.map((p) => p.record.fleetSize)),
    criticalRiskCount: tierCounts.critical,
    tierCounts,
    marketPenetration:
      populationSize === undefined ? null : populationSize === 0 ? 0 : prospects.length / populationSize,
  };
}

/** Per-state rollup, sorted by state code. */
export function summarizeByState(prospects: readonly RankedProspect[]): StateSummary[] {
  const byState = new Map<string, RankedProspect[]>();
  for (const p of prospects) {
    const bucket = byState.get(p.record.state);
    if (bucket) bucket.push(p);
    else byState.set(p.record.state, [p]);
  }

  return [...byState.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([state, group]) => ({
      state,
      carrierCount: group.length,
      avgRiskScore: mean(group.map((p) => p.score.churnRiskScore)),
      totalSavingsPotential: sum(group.map((p) => p.score.estimatedAnnualSavings)),
      avgFleetSize: mean(group.map((p) => p.record.fleetSize)),
      avgWagePercentile: mean(group.map((p) => p.record.wagePercentile)),
      avgOutOfServiceRate: mean(group.map((p) => p.record.outOfServiceRate)),
    }));
}

/** Highest average churn first; ties by state code. */
export function topRiskStates(summaries: readonly StateSummary[], limit: number): StateSummary[] {
  if (!Number.isInteger(limit) || limit < 0) throw invalidParameter("limit must be a non-negative integer", { limit });
  return [...summaries]
    .sort((a, b) => b.avgRiskScore - a.avgRiskScore || (a.state < b.state ? -1 : a.state > b.state ? 1 : 0))
    .slice(0, limit);
}
