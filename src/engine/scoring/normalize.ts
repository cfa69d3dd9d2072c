/**
 * Cohort-relative min–max normalization. computeCohortBounds is the reduction
 * pass; normalizeMinMax is applied per record afterwards.
 */

import type { CarrierRecord } from "@/domain/carrier/carrier.schema";
import type { CohortBounds, FactorBounds } from "@/domain/scoring/scoring.types";
import { NEUTRAL_NORMALIZED } from "@/config/scoringDefaults";
import { clamp01 } from "@/lib/math";
import { emptyCohort } from "@/lib/errors";

/** Violations per power unit; fleetSize is validated > 0 before scoring. */
export function violationsPerUnit(record: CarrierRecord): number {
  return record.safetyViolations / record.fleetSize;
}

function boundsOf(values: readonly number[]): FactorBounds {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function computeCohortBounds(records: readonly CarrierRecord[]): CohortBounds {
  if (records.length === 0) throw emptyCohort();
  return {
    safetyScore: boundsOf(records.map((r) => r.safetyScore)),
    wagePercentile: boundsOf(records.map((r) => r.wagePercentile)),
    outOfServiceRate: boundsOf(records.map((r) => r.outOfServiceRate)),
    crashRate: boundsOf(records.map((r) => r.crashRate)),
    violationsPerUnit: boundsOf(records.map(violationsPerUnit)),
  };
}

/** (x - min) / (max - min), clamped to 0..1; neutral 0.5 when the cohort has no spread. */
export function normalizeMinMax(x: number, bounds: FactorBounds): number {
  const range = bounds.max - bounds.min;
  if (!(range > 0)) return NEUTRAL_NORMALIZED;
  return clamp01((x - bounds.min) / range);
}
