/** Synthetic population limits and distribution parameters. */
export const GENERATOR_LIMITS = {
  maxCount: 100_000,
  fleetSizeMin: 10,
  fleetSizeMax: 500,
  wagePercentileMin: 5,
  wagePercentileMax: 95,
  crashRateFloor: 0.1,
} as const;

export const GENERATOR_DISTRIBUTIONS = {
  /** lognormal(mu, sigma) for power units. */
  fleetLogMean: 3.5,
  fleetLogSigma: 0.8,
  /** Mean of the latent violation propensity (exponential). */
  violationPropensityMean: 2.5,
  crashRateMean: 1.2,
  baseViolationLambda: 2,
  /** Per-state bases, drawn once per generation. */
  stateSafetyMean: 82,
  stateSafetySd: 6,
  stateWageMean: 70,
  stateWageSd: 8,
  safetyNoiseSd: 6,
  wageNoiseSd: 15,
  oosNoiseSd: 0.04,
} as const;

export const VIOLATION_HISTORY_DEFAULTS = {
  months: 24,
  maxMonths: 120,
  baseLambda: 3,
  seasonalAmplitude: 0.3,
} as const;
