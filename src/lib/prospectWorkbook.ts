/**
 * Excel (.xlsx) hand-off for sales teams.
 * Export: "Prospects" (ranked list) and "States" (per-state rollup) sheets.
 * Import: first worksheet, first row = headers, one carrier per row.
 */

import * as XLSX from "xlsx";
import { CarrierRecordSchema, type CarrierRecord } from "@/domain/carrier/carrier.schema";
import type { RankedProspect } from "@/domain/prospect/prospect.types";
import { summarizeByState } from "@/engine/ranking/summarize";
import { invalidParameter } from "@/lib/errors";
import { roundTo } from "@/lib/math";

export const PROSPECT_SHEET = "Prospects";
export const STATE_SHEET = "States";

/** Header ↔ record field; shared by export and import so a downloaded sheet can be re-uploaded. */
const CARRIER_COLUMNS = [
  ["Carrier ID", "carrierId"],
  ["Carrier Name", "carrierName"],
  ["State", "state"],
  ["City", "city"],
  ["Cargo Type", "cargoType"],
  ["Fleet Size", "fleetSize"],
  ["Safety Score", "safetyScore"],
  ["Out-of-Service Rate", "outOfServiceRate"],
  ["Crash Rate", "crashRate"],
  ["Safety Violations", "safetyViolations"],
  ["Wage Percentile", "wagePercentile"],
] as const satisfies ReadonlyArray<readonly [string, keyof CarrierRecord]>;

const NUMERIC_FIELDS = new Set<keyof CarrierRecord>([
  "fleetSize",
  "safetyScore",
  "outOfServiceRate",
  "crashRate",
  "safetyViolations",
  "wagePercentile",
]);

function prospectRow(p: RankedProspect): Record<string, string | number> {
  const row: Record<string, string | number> = { Rank: p.rank };
  for (const [header, field] of CARRIER_COLUMNS) row[header] = p.record[field];
  row["Churn Risk Score"] = roundTo(p.score.churnRiskScore, 1);
  row["Risk Tier"] = p.score.riskTier;
  row["Estimated Annual Savings"] = p.score.estimatedAnnualSavings;
  return row;
}

export function buildProspectWorkbook(prospects: readonly RankedProspect[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(prospects.map(prospectRow)), PROSPECT_SHEET);

  const stateRows = summarizeByState(prospects).map((s) => ({
    State: s.state,
    Carriers: s.carrierCount,
    "Avg Risk Score": roundTo(s.avgRiskScore, 1),
    "Total Savings Potential": s.totalSavingsPotential,
    "Avg Fleet Size": roundTo(s.avgFleetSize, 1),
    "Avg Wage Percentile": roundTo(s.avgWagePercentile, 1),
    "Avg Out-of-Service Rate": roundTo(s.avgOutOfServiceRate, 3),
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(stateRows), STATE_SHEET);
  return workbook;
}

export function writeProspectWorkbook(prospects: readonly RankedProspect[]): Buffer {
  const out: unknown = XLSX.write(buildProspectWorkbook(prospects), { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("xlsx did not return a Buffer");
  return out;
}

function cellValue(field: keyof CarrierRecord, value: unknown): unknown {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  if (NUMERIC_FIELDS.has(field)) return typeof value === "number" ? value : Number(String(value).trim());
  return String(value).trim();
}

/**
 * Parse carriers from the first worksheet. Unknown columns are ignored.
 * Throws InvalidParameter for a workbook without sheets or a row that fails validation
 * (row numbers are 1-based sheet rows, header = row 1).
 */
export function parseCarrierWorkbook(data: Buffer): CarrierRecord[] {
  const workbook = XLSX.read(data, { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) throw invalidParameter("Workbook has no worksheets");
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) throw invalidParameter("First worksheet could not be read");

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "", raw: true });

  return rows.map((row, i) => {
    // sheet_to_json tags each row with its 0-based sheet row (non-enumerable __rowNum__)
    const rowNum = row["__rowNum__"];
    const sheetRow = typeof rowNum === "number" ? rowNum + 1 : i + 2;
    const candidate: Record<string, unknown> = {};
    for (const [header, field] of CARRIER_COLUMNS) candidate[field] = cellValue(field, row[header]);
    const parsed = CarrierRecordSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw invalidParameter(`Row ${sheetRow}: ${issue?.path.join(".")} ${issue?.message}`, { row: sheetRow });
    }
    return parsed.data;
  });
}
