/**
 * Synthetic carrier population — deterministic for a given (seed, count).
 * Each state gets a base safety score and wage percentile; carriers add their own
 * noise plus a latent violation propensity that moves safety, wage, out-of-service,
 * crash and violation figures together, so geographic clusters emerge on their own.
 */

import type { CargoType, CarrierRecord } from "@/domain/carrier/carrier.schema";
import { GENERATOR_DISTRIBUTIONS as D, GENERATOR_LIMITS } from "@/config/generatorDefaults";
import { MAX_SEED, createRng, isValidSeed, type Rng } from "@/lib/random";
import { invalidParameter } from "@/lib/errors";
import { clamp, roundTo } from "@/lib/math";
import { dlog } from "@/lib/debug";
import { MARKET_DATA, type MarketData } from "./marketData";

type StateBase = { safety: number; wage: number };

export function assertGeneratorParams(seed: number, count: number): void {
  if (typeof seed !== "number" || !isValidSeed(seed)) {
    throw invalidParameter(`seed must be an integer in 0..${MAX_SEED}`, { seed });
  }
  if (typeof count !== "number" || !Number.isInteger(count) || count <= 0) {
    throw invalidParameter("count must be a positive integer", { count });
  }
  if (count > GENERATOR_LIMITS.maxCount) {
    throw invalidParameter(`count must not exceed ${GENERATOR_LIMITS.maxCount}`, { count });
  }
}

/** Drawn in data-file order so the bases depend only on the seed. */
function drawStateBases(rng: Rng, market: MarketData): Map<string, StateBase> {
  const bases = new Map<string, StateBase>();
  for (const { code } of market.states) {
    bases.set(code, {
      safety: clamp(rng.normal(D.stateSafetyMean, D.stateSafetySd), 60, 95),
      wage: clamp(rng.normal(D.stateWageMean, D.stateWageSd), 50, 85),
    });
  }
  return bases;
}

function pickCargoType(rng: Rng, market: MarketData): CargoType {
  const total = market.cargoMix.reduce((sum, c) => sum + c.weight, 0);
  let u = rng.next() * total;
  for (const entry of market.cargoMix) {
    u -= entry.weight;
    if (u < 0) return entry.cargoType;
  }
  return market.cargoMix[market.cargoMix.length - 1].cargoType;
}

function generateCarrier(index: number, rng: Rng, market: MarketData, bases: Map<string, StateBase>): CarrierRecord {
  const stateEntry = rng.pick(market.states);
  const city = rng.pick(stateEntry.cities);
  const carrierName = `${rng.pick(market.nameModifiers)} ${rng.pick(market.nameTypes)} Co.`;
  const cargoType = pickCargoType(rng, market);

  const fleetSize = clamp(
    Math.floor(rng.lognormal(D.fleetLogMean, D.fleetLogSigma)),
    GENERATOR_LIMITS.fleetSizeMin,
    GENERATOR_LIMITS.fleetSizeMax
  );

  const propensity = rng.exponential(D.violationPropensityMean);
  const base = bases.get(stateEntry.code) ?? { safety: D.stateSafetyMean, wage: D.stateWageMean };

  const safetyScore = clamp(base.safety - propensity * 7 + rng.normal(0, D.safetyNoiseSd), 0, 100);
  const wagePercentile = clamp(
    base.wage - propensity * 8 + rng.normal(0, D.wageNoiseSd),
    GENERATOR_LIMITS.wagePercentileMin,
    GENERATOR_LIMITS.wagePercentileMax
  );
  const outOfServiceRate = clamp(0.05 + propensity * 0.06 + rng.normal(0, D.oosNoiseSd), 0, 1);
  const crashRate = Math.max(GENERATOR_LIMITS.crashRateFloor, rng.exponential(D.crashRateMean) + propensity * 0.3);
  const safetyViolations = Math.max(
    0,
    Math.floor(fleetSize * 0.1 * propensity + rng.poisson(D.baseViolationLambda))
  );

  return {
    carrierId: `USDOT${100000 + index}`,
    carrierName,
    state: stateEntry.code,
    city,
    fleetSize,
    safetyScore: roundTo(safetyScore, 1),
    outOfServiceRate: roundTo(outOfServiceRate, 3),
    crashRate: roundTo(crashRate, 2),
    safetyViolations,
    wagePercentile: roundTo(wagePercentile, 1),
    cargoType,
  };
}

/**
 * Generate `count` carriers from `seed`. Same inputs → identical output.
 * Throws InvalidParameter for a seed outside 0..MAX_SEED or a count outside 1..maxCount.
 */
export function generate(seed: number, count: number): CarrierRecord[] {
  assertGeneratorParams(seed, count);

  const rng = createRng(seed);
  const bases = drawStateBases(rng, MARKET_DATA);
  const carriers: CarrierRecord[] = [];
  for (let i = 0; i < count; i++) {
    carriers.push(generateCarrier(i, rng, MARKET_DATA, bases));
  }

  dlog("[generate] carriers", { seed, count, states: bases.size });
  return carriers;
}
