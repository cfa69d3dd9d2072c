/**
 * Input checks for the scorer: records must honour their declared bounds and be
 * uniquely keyed; config must parse against ScoringConfigSchema.
 */

import { CarrierRecordSchema, type CarrierRecord } from "@/domain/carrier/carrier.schema";
import { ScoringConfigSchema, type ScoringConfig } from "@/domain/scoring/scoring.types";
import { emptyCohort, invalidParameter } from "@/lib/errors";

export function validateCohort(records: readonly CarrierRecord[]): void {
  if (records.length === 0) throw emptyCohort();

  const seen = new Set<string>();
  records.forEach((record, index) => {
    const parsed = CarrierRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw invalidParameter(`Invalid carrier record at index ${index}: ${issue?.path.join(".")} ${issue?.message}`, {
        index,
        carrierId: record.carrierId,
      });
    }
    if (seen.has(record.carrierId)) {
      throw invalidParameter(`Duplicate carrierId ${record.carrierId}`, { index, carrierId: record.carrierId });
    }
    seen.add(record.carrierId);
  });
}

export function validateScoringConfig(config: ScoringConfig): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalidParameter(`Invalid scoring config: ${issue?.path.join(".")} ${issue?.message}`);
  }
  return parsed.data;
}
