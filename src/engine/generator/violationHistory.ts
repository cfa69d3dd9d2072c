/**
 * Monthly safety-violation series for trend charts. Poisson base counts with a
 * yearly seasonal swing; the stream is keyed by (seed, carrierId) so one carrier's
 * history never shifts when another is requested first.
 */

import { VIOLATION_HISTORY_DEFAULTS } from "@/config/generatorDefaults";
import { MAX_SEED, createRng, hashSeed, isValidSeed } from "@/lib/random";
import { invalidParameter } from "@/lib/errors";

export type ViolationHistoryPoint = {
  carrierId: string;
  /** YYYY-MM */
  month: string;
  safetyViolations: number;
};

export type ViolationHistoryOptions = {
  /** Last month of the series, YYYY-MM. */
  endMonth: string;
  months?: number;
};

const MONTH_RE = /^(\d{4})-(0[1-9]|1[0-2])$/;

function parseMonth(value: string): { year: number; monthIndex: number } | null {
  const m = MONTH_RE.exec(value);
  if (!m) return null;
  return { year: Number(m[1]), monthIndex: Number(m[2]) - 1 };
}

function formatMonth(absoluteMonth: number): string {
  const year = Math.floor(absoluteMonth / 12);
  const month = (absoluteMonth % 12) + 1;
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

export function generateViolationHistory(
  seed: number,
  carrierId: string,
  options: ViolationHistoryOptions
): ViolationHistoryPoint[] {
  const months = options.months ?? VIOLATION_HISTORY_DEFAULTS.months;
  if (!isValidSeed(seed)) throw invalidParameter(`seed must be an integer in 0..${MAX_SEED}`, { seed });
  if (!carrierId) throw invalidParameter("carrierId is required");
  if (!Number.isInteger(months) || months <= 0 || months > VIOLATION_HISTORY_DEFAULTS.maxMonths) {
    throw invalidParameter(`months must be an integer in 1..${VIOLATION_HISTORY_DEFAULTS.maxMonths}`, { months });
  }
  const end = parseMonth(options.endMonth);
  if (!end) throw invalidParameter("endMonth must be formatted YYYY-MM", { endMonth: options.endMonth });

  const rng = createRng(hashSeed(seed, carrierId));
  const endAbsolute = end.year * 12 + end.monthIndex;
  const startAbsolute = endAbsolute - (months - 1);

  const points: ViolationHistoryPoint[] = [];
  for (let i = 0; i < months; i++) {
    const base = rng.poisson(VIOLATION_HISTORY_DEFAULTS.baseLambda);
    const seasonal = 1 + VIOLATION_HISTORY_DEFAULTS.seasonalAmplitude * Math.sin((2 * Math.PI * i) / 12);
    points.push({
      carrierId,
      month: formatMonth(startAbsolute + i),
      safetyViolations: Math.max(0, Math.floor(base * seasonal)),
    });
  }
  return points;
}
