import { z } from "zod";

/**
 * Enums (tight + explicit = consistency everywhere)
 */
export const CargoTypeSchema = z.enum([
  "general_freight",
  "refrigerated",
  "flatbed",
  "tanker",
  "intermodal",
  "hazmat",
]);
export type CargoType = z.infer<typeof CargoTypeSchema>;

/** Two-letter US state code, upper case. */
export const StateCodeSchema = z.string().regex(/^[A-Z]{2}$/, "Expected a two-letter state code");

export const RiskTierSchema = z.enum(["normal", "watch", "high", "critical"]);
export type RiskTier = z.infer<typeof RiskTierSchema>;

/**
 * One simulated carrier, shaped after FMCSA census/inspection data joined with
 * BLS wage benchmarks.
 */
export const CarrierRecordSchema = z.object({
  carrierId: z.string().min(1),
  carrierName: z.string().min(1),

  state: StateCodeSchema,
  city: z.string().min(1),

  /** Power units; per-driver cost figures divide by this. */
  fleetSize: z.number().int().positive(),

  /** 0–100, lower = worse compliance. */
  safetyScore: z.number().min(0).max(100),
  outOfServiceRate: z.number().min(0).max(1),
  /** Severity-weighted crashes per million miles. */
  crashRate: z.number().min(0).finite(),
  /** Violations recorded over the trailing year. */
  safetyViolations: z.number().int().min(0),

  /** Driver wage percentile against the state benchmark (0–100). */
  wagePercentile: z.number().min(0).max(100),

  cargoType: CargoTypeSchema,
});
export type CarrierRecord = z.infer<typeof CarrierRecordSchema>;

/** Risk-direction factors (0..1) that feed the composite. */
export type ComponentScores = {
  safety: number;
  wage: number;
  fleet: number;
};

export type RiskScore = {
  readonly carrierId: string;
  /** 0–100, higher = greater retention risk. */
  readonly churnRiskScore: number;
  /** Whole dollars per year if the retention programme is adopted. */
  readonly estimatedAnnualSavings: number;
  readonly componentScores: Readonly<ComponentScores>;
  readonly riskTier: RiskTier;
};

export type RiskScoreMap = ReadonlyMap<string, RiskScore>;
