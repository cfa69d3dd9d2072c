/**
 * Reference lists for the synthetic market (states, cities, name parts, cargo mix),
 * validated once when the module loads.
 */

import { z } from "zod";
import rawMarket from "../../data/carrierMarket.json";
import { CargoTypeSchema, StateCodeSchema } from "@/domain/carrier/carrier.schema";

const MarketDataSchema = z.object({
  states: z
    .array(z.object({ code: StateCodeSchema, cities: z.array(z.string().min(1)).min(1) }))
    .min(1),
  nameModifiers: z.array(z.string().min(1)).min(1),
  nameTypes: z.array(z.string().min(1)).min(1),
  cargoMix: z
    .array(z.object({ cargoType: CargoTypeSchema, weight: z.number().positive() }))
    .min(1),
});
export type MarketData = z.infer<typeof MarketDataSchema>;

export const MARKET_DATA: MarketData = MarketDataSchema.parse(rawMarket);

export const MARKET_STATE_CODES: readonly string[] = MARKET_DATA.states.map((s) => s.code);
