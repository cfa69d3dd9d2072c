/**
 * Risk scoring engine — pure deterministic functions.
 */

export { score, scoreRecord, computeComponentScores } from "./scoreCarriers";
export { computeCohortBounds, normalizeMinMax, violationsPerUnit } from "./normalize";
export { estimateAnnualSavings } from "./savings";
export { validateCohort, validateScoringConfig } from "./validate";
