export { rank, compareProspects, topSavingsProspects } from "./rankProspects";
export { validateCriteria, matchesCriteria, filterCarriers } from "./filterCarriers";
export { summarize, summarizeByState, topRiskStates } from "./summarize";
export type { SummarizeOptions } from "./summarize";
