import { describe, it } from "node:test";
import assert from "node:assert";
import { generateViolationHistory } from "./violationHistory";
import { isProspectPipelineError } from "@/lib/errors";

describe("generateViolationHistory", () => {
  it("defaults to 24 months ending at endMonth", () => {
    const points = generateViolationHistory(42, "USDOT100000", { endMonth: "2025-06" });
    assert.strictEqual(points.length, 24);
    assert.strictEqual(points[0].month, "2023-07");
    assert.strictEqual(points[23].month, "2025-06");
    assert(points.every((p) => p.carrierId === "USDOT100000" && p.safetyViolations >= 0));
  });

  it("labels months across a year boundary", () => {
    const points = generateViolationHistory(42, "USDOT100000", { endMonth: "2025-01", months: 3 });
    assert.deepStrictEqual(
      points.map((p) => p.month),
      ["2024-11", "2024-12", "2025-01"]
    );
  });

  it("is deterministic per carrier regardless of call order", () => {
    const a1 = generateViolationHistory(9, "USDOT1", { endMonth: "2025-12", months: 12 });
    generateViolationHistory(9, "USDOT2", { endMonth: "2025-12", months: 12 });
    const a2 = generateViolationHistory(9, "USDOT1", { endMonth: "2025-12", months: 12 });
    assert.deepStrictEqual(a1, a2);
  });

  it("rejects malformed inputs", () => {
    const isInvalid = (err: unknown) => isProspectPipelineError(err, "InvalidParameter");
    assert.throws(() => generateViolationHistory(1, "USDOT1", { endMonth: "2025-13" }), isInvalid);
    assert.throws(() => generateViolationHistory(1, "USDOT1", { endMonth: "2025-01", months: 0 }), isInvalid);
    assert.throws(() => generateViolationHistory(1, "", { endMonth: "2025-01" }), isInvalid);
    assert.throws(() => generateViolationHistory(2 ** 32, "USDOT1", { endMonth: "2025-01" }), isInvalid);
  });
});
