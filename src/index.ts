/**
 * Public surface consumed by the dashboard / hosting layer:
 * generate → score → rank → summarize.
 */

export type {
  CargoType,
  CarrierRecord,
  ComponentScores,
  RiskScore,
  RiskScoreMap,
  RiskTier,
} from "@/domain/carrier/carrier.schema";
export { CarrierRecordSchema, CargoTypeSchema } from "@/domain/carrier/carrier.schema";
export { createCarrier } from "@/domain/carrier/carrier.factory";
export type {
  FilterCriteria,
  ProspectKpi,
  RankedProspect,
  ScoringMode,
  StateSummary,
} from "@/domain/prospect/prospect.types";
export type { CohortBounds, ScoringConfig, ScoringWeights, SavingsModel } from "@/domain/scoring/scoring.types";

export { DEFAULT_SCORING_CONFIG, DEFAULT_SCORING_WEIGHTS } from "@/config/scoringDefaults";
export { getRiskTier, riskTierThresholds } from "@/config/riskTiers";

export { generate } from "@/engine/generator/generateCarriers";
export { generateViolationHistory } from "@/engine/generator/violationHistory";
export type { ViolationHistoryPoint, ViolationHistoryOptions } from "@/engine/generator/violationHistory";
export { score, scoreRecord, computeCohortBounds, estimateAnnualSavings } from "@/engine/scoring";
export {
  rank,
  summarize,
  summarizeByState,
  topRiskStates,
  topSavingsProspects,
  validateCriteria,
} from "@/engine/ranking";
export type { SummarizeOptions } from "@/engine/ranking";

export { ProspectPipelineError, isProspectPipelineError } from "@/lib/errors";
export type { ProspectPipelineErrorKind } from "@/lib/errors";
export { buildProspectWorkbook, writeProspectWorkbook, parseCarrierWorkbook } from "@/lib/prospectWorkbook";
