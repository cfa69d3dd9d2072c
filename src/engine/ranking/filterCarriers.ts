import type { CarrierRecord } from "@/domain/carrier/carrier.schema";
import { FilterCriteriaSchema, type FilterCriteria } from "@/domain/prospect/prospect.types";
import { invalidCriteria } from "@/lib/errors";

/**
 * Parses criteria and rejects inverted ranges. Returns the parsed copy.
 */
export function validateCriteria(criteria: FilterCriteria): FilterCriteria {
  const parsed = FilterCriteriaSchema.safeParse(criteria);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalidCriteria(`Invalid filter criteria: ${issue?.path.join(".")} ${issue?.message}`);
  }
  const c = parsed.data;
  if (c.fleetSizeMin !== undefined && c.fleetSizeMax !== undefined && c.fleetSizeMin > c.fleetSizeMax) {
    throw invalidCriteria("fleetSizeMin is greater than fleetSizeMax", {
      fleetSizeMin: c.fleetSizeMin,
      fleetSizeMax: c.fleetSizeMax,
    });
  }
  if (c.safetyScoreMin !== undefined && c.safetyScoreMax !== undefined && c.safetyScoreMin > c.safetyScoreMax) {
    throw invalidCriteria("safetyScoreMin is greater than safetyScoreMax", {
      safetyScoreMin: c.safetyScoreMin,
      safetyScoreMax: c.safetyScoreMax,
    });
  }
  return c;
}

/** Conjunctive match on record attributes; unset fields (and empty lists) do not constrain. */
export function matchesCriteria(record: CarrierRecord, criteria: FilterCriteria): boolean {
  const { states, cargoTypes } = criteria;
  if (states && states.length > 0 && !states.includes(record.state)) return false;
  if (cargoTypes && cargoTypes.length > 0 && !cargoTypes.includes(record.cargoType)) return false;
  if (criteria.fleetSizeMin !== undefined && record.fleetSize < criteria.fleetSizeMin) return false;
  if (criteria.fleetSizeMax !== undefined && record.fleetSize > criteria.fleetSizeMax) return false;
  if (criteria.safetyScoreMin !== undefined && record.safetyScore < criteria.safetyScoreMin) return false;
  if (criteria.safetyScoreMax !== undefined && record.safetyScore > criteria.safetyScoreMax) return false;
  return true;
}

export function filterCarriers(records: readonly CarrierRecord[], criteria: FilterCriteria): CarrierRecord[] {
  return records.filter((r) => matchesCriteria(r, criteria));
}
