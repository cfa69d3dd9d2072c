import type { CarrierRecord } from "./carrier.schema";

/**
 * Builds a carrier with mid-range defaults; handy for fixtures and for the
 * workbook importer when optional columns are blank.
 */
export function createCarrier(partial?: Partial<CarrierRecord>): CarrierRecord {
  const carrierId = partial?.carrierId ?? "USDOT100000";

  return {
    carrierId,
    carrierName: partial?.carrierName ?? "Regional Freight Co.",

    state: partial?.state ?? "GA",
    city: partial?.city ?? "Atlanta",

    fleetSize: partial?.fleetSize ?? 40,

    safetyScore: partial?.safetyScore ?? 70,
    outOfServiceRate: partial?.outOfServiceRate ?? 0.2,
    crashRate: partial?.crashRate ?? 1.5,
    safetyViolations: partial?.safetyViolations ?? 8,

    wagePercentile: partial?.wagePercentile ?? 50,

    cargoType: partial?.cargoType ?? "general_freight",
  };
}
