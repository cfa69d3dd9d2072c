import { describe, it } from "node:test";
import assert from "node:assert";
import { generate, isProspectPipelineError, rank, score, summarize } from "./index";
import { compareProspects } from "@/engine/ranking";

describe("generate → score → rank → summarize", () => {
  it("ranks Texas carriers with 50+ power units from a seeded population", () => {
    const carriers = generate(42, 400);
    const scores = score(carriers);
    const ranked = rank(carriers, scores, { states: ["TX"], fleetSizeMin: 50 });

    const expectedIds = carriers
      .filter((c) => c.state === "TX" && c.fleetSize >= 50)
      .map((c) => c.carrierId)
      .sort();
    assert.deepStrictEqual(ranked.map((p) => p.record.carrierId).sort(), expectedIds);
    assert.deepStrictEqual(
      ranked.map((p) => p.rank),
      ranked.map((_, i) => i + 1)
    );
    for (let i = 1; i < ranked.length; i++) {
      assert(compareProspects(ranked[i - 1], ranked[i]) < 0, `order broken at ${i}`);
    }

    const kpi = summarize(ranked, { populationSize: carriers.length });
    assert.strictEqual(kpi.carrierCount, ranked.length);
    assert.strictEqual(kpi.marketPenetration, ranked.length / carriers.length);
  });

  it("surfaces pipeline errors with their kind", () => {
    assert.throws(() => generate(42, 0), (err) => isProspectPipelineError(err, "InvalidParameter"));
    assert.throws(() => score([]), (err) => isProspectPipelineError(err, "EmptyCohort"));
    const carriers = generate(42, 5);
    assert.throws(
      () => rank(carriers, score(carriers), { fleetSizeMin: 10, fleetSizeMax: 1 }),
      (err) => isProspectPipelineError(err, "InvalidCriteria")
    );
  });
});
