import { describe, it } from "node:test";
import assert from "node:assert";
import { rank, topSavingsProspects } from "./rankProspects";
import { validateCriteria } from "./filterCarriers";
import { createCarrier } from "@/domain/carrier/carrier.factory";
import type { CarrierRecord, RiskScore } from "@/domain/carrier/carrier.schema";
import { getRiskTier } from "@/config/riskTiers";
import { DEFAULT_SCORING_CONFIG } from "@/config/scoringDefaults";
import { score } from "@/engine/scoring";
import { isProspectPipelineError } from "@/lib/errors";

function fixedScore(carrierId: string, churnRiskScore: number, estimatedAnnualSavings: number): RiskScore {
  return {
    carrierId,
    churnRiskScore,
    estimatedAnnualSavings,
    componentScores: { safety: 0.5, wage: 0.5, fleet: 0.5 },
    riskTier: getRiskTier(churnRiskScore),
  };
}

const isInvalidCriteria = (err: unknown) => isProspectPipelineError(err, "InvalidCriteria");

describe("rank", () => {
  it("orders by churn desc, then savings desc, then carrierId asc", () => {
    const records = ["USDOT4", "USDOT3", "USDOT2", "USDOT1"].map((carrierId) => createCarrier({ carrierId }));
    const scores = new Map<string, RiskScore>([
      ["USDOT1", fixedScore("USDOT1", 70, 1_000)],
      ["USDOT2", fixedScore("USDOT2", 90, 0)],
      ["USDOT3", fixedScore("USDOT3", 70, 5_000)],
      ["USDOT4", fixedScore("USDOT4", 70, 5_000)],
    ]);

    const ranked = rank(records, scores, {});
    assert.deepStrictEqual(
      ranked.map((p) => [p.rank, p.record.carrierId]),
      [
        [1, "USDOT2"],
        [2, "USDOT3"],
        [3, "USDOT4"],
        [4, "USDOT1"],
      ]
    );
  });

  it("applies every criterion conjunctively", () => {
    const records: CarrierRecord[] = [
      createCarrier({ carrierId: "USDOT1", state: "TX", fleetSize: 60 }),
      createCarrier({ carrierId: "USDOT2", state: "TX", fleetSize: 30 }),
      createCarrier({ carrierId: "USDOT3", state: "GA", fleetSize: 80 }),
      createCarrier({ carrierId: "USDOT4", state: "TX", fleetSize: 50 }),
    ];
    const ranked = rank(records, score(records), { states: ["TX"], fleetSizeMin: 50 });

    assert.deepStrictEqual(ranked.map((p) => p.record.carrierId).sort(), ["USDOT1", "USDOT4"]);
    assert(ranked.every((p) => p.record.state === "TX" && p.record.fleetSize >= 50));
  });

  it("filters on safety range, cargo type and minimum churn score", () => {
    const records: CarrierRecord[] = [
      createCarrier({ carrierId: "USDOT1", safetyScore: 30, cargoType: "tanker" }),
      createCarrier({ carrierId: "USDOT2", safetyScore: 55, cargoType: "tanker" }),
      createCarrier({ carrierId: "USDOT3", safetyScore: 55, cargoType: "flatbed" }),
      createCarrier({ carrierId: "USDOT4", safetyScore: 90, cargoType: "tanker" }),
    ];
    const scores = new Map<string, RiskScore>([
      ["USDOT1", fixedScore("USDOT1", 80, 0)],
      ["USDOT2", fixedScore("USDOT2", 40, 0)],
      ["USDOT3", fixedScore("USDOT3", 60, 0)],
      ["USDOT4", fixedScore("USDOT4", 10, 0)],
    ]);

    const inRange = rank(records, scores, { safetyScoreMin: 20, safetyScoreMax: 60, cargoTypes: ["tanker"] });
    assert.deepStrictEqual(inRange.map((p) => p.record.carrierId), ["USDOT1", "USDOT2"]);

    const risky = rank(records, scores, { minRiskScore: 50 });
    assert.deepStrictEqual(risky.map((p) => p.record.carrierId), ["USDOT1", "USDOT3"]);
  });

  it("absolute mode reuses the precomputed scores", () => {
    const records = [createCarrier({ carrierId: "USDOT1" }), createCarrier({ carrierId: "USDOT2" })];
    const scores = new Map<string, RiskScore>([
      ["USDOT1", fixedScore("USDOT1", 12, 3)],
      ["USDOT2", fixedScore("USDOT2", 34, 5)],
    ]);
    const ranked = rank(records, scores, { scoringMode: "absolute" });
    assert.strictEqual(ranked[0].score, scores.get("USDOT2"));
    assert.strictEqual(ranked[1].score, scores.get("USDOT1"));
  });

  it("relative mode re-scores against the filtered cohort", () => {
    const records: CarrierRecord[] = [
      createCarrier({ carrierId: "USDOT1", state: "GA", safetyScore: 10 }),
      createCarrier({ carrierId: "USDOT2", state: "TX", safetyScore: 60 }),
      createCarrier({ carrierId: "USDOT3", state: "TX", safetyScore: 80 }),
    ];
    const full = score(records);
    const ranked = rank(records, full, { states: ["TX"], scoringMode: "relative" });
    const texasOnly = score(records.slice(1));

    assert.strictEqual(ranked.length, 2);
    for (const p of ranked) assert.deepStrictEqual(p.score, texasOnly.get(p.record.carrierId));
    // USDOT2 is the worst safety score among Texas carriers, but not in the full population
    const usdot2 = ranked.find((p) => p.record.carrierId === "USDOT2");
    assert(usdot2);
    assert.strictEqual(usdot2.score.componentScores.safety, 1);
    assert.notStrictEqual(full.get("USDOT2")?.componentScores.safety, 1);
  });

  it("relative mode applies its scoringConfig and filters on the re-derived score", () => {
    const records: CarrierRecord[] = [
      createCarrier({ carrierId: "USDOT1", state: "TX", wagePercentile: 90, safetyScore: 10 }),
      createCarrier({ carrierId: "USDOT2", state: "TX", wagePercentile: 10, safetyScore: 90 }),
      createCarrier({ carrierId: "USDOT3", state: "GA", wagePercentile: 50, safetyScore: 50 }),
    ];
    const wageOnly = { ...DEFAULT_SCORING_CONFIG, weights: { safety: 0, wage: 1, fleet: 0 } };

    const ranked = rank(records, score(records), {
      states: ["TX"],
      scoringMode: "relative",
      scoringConfig: wageOnly,
      minRiskScore: 50,
    });

    assert.deepStrictEqual(
      ranked.map((p) => [p.record.carrierId, p.score.churnRiskScore]),
      [["USDOT2", 100]]
    );
  });

  it("returns an empty list when nothing matches", () => {
    const records = [createCarrier({ carrierId: "USDOT1", state: "GA" })];
    assert.deepStrictEqual(rank(records, score(records), { states: ["TX"], scoringMode: "relative" }), []);
  });

  it("fails with EmptyCohort for no records", () => {
    assert.throws(() => rank([], new Map(), {}), (err) => isProspectPipelineError(err, "EmptyCohort"));
  });

  it("fails with InvalidParameter when a carrier has no score in absolute mode", () => {
    const records = [createCarrier({ carrierId: "USDOT1" })];
    assert.throws(() => rank(records, new Map(), {}), (err) => isProspectPipelineError(err, "InvalidParameter"));
  });
});

describe("validateCriteria", () => {
  it("rejects inverted ranges", () => {
    assert.throws(() => validateCriteria({ fleetSizeMin: 100, fleetSizeMax: 50 }), isInvalidCriteria);
    assert.throws(() => validateCriteria({ safetyScoreMin: 80, safetyScoreMax: 20 }), isInvalidCriteria);
  });

  it("rejects malformed state codes, out-of-range bounds and unknown keys", () => {
    assert.throws(() => validateCriteria({ states: ["Texas"] }), isInvalidCriteria);
    assert.throws(() => validateCriteria({ safetyScoreMax: 120 }), isInvalidCriteria);
    assert.throws(() => validateCriteria({ fleetSizeMin: -1 }), isInvalidCriteria);
    const withTypo = { fleetSizeMin: 10, fleetSizeMinimum: 20 };
    assert.throws(() => validateCriteria(withTypo), isInvalidCriteria);
  });

  it("accepts equal bounds and empty criteria", () => {
    assert.deepStrictEqual(validateCriteria({ fleetSizeMin: 50, fleetSizeMax: 50 }), {
      fleetSizeMin: 50,
      fleetSizeMax: 50,
    });
    assert.deepStrictEqual(validateCriteria({}), {});
  });
});

describe("topSavingsProspects", () => {
  it("keeps the largest savings first", () => {
    const records = ["USDOT1", "USDOT2", "USDOT3"].map((carrierId) => createCarrier({ carrierId }));
    const scores = new Map<string, RiskScore>([
      ["USDOT1", fixedScore("USDOT1", 90, 100)],
      ["USDOT2", fixedScore("USDOT2", 50, 900)],
      ["USDOT3", fixedScore("USDOT3", 70, 400)],
    ]);
    const top = topSavingsProspects(rank(records, scores), 2);
    assert.deepStrictEqual(top.map((p) => p.record.carrierId), ["USDOT2", "USDOT3"]);
  });
});
