import path from "node:path";

import fse from "fs-extra";

import { stringifyAsciiJson } from "./json.js";
import { formatFloat } from "./numbers.js";
import { FLOAT_FIELDS, type RunRecord } from "./sweep-record.js";

// =============================================================================
// COLUMNS
// =============================================================================

export const SWEEP_CSV_COLUMNS = [
  "run_index",
  "run_total",
  "run_name",
  "booster_score",
  "booster_max",
  "ensemble_score",
  "gain",
  "duration_s",
  "oof_seeds",
  "folds",
  "epochs",
  "ensemble_agg",
  "ensemble_threshold",
  "ensemble_tp",
  "ensemble_fn",
  "ensemble_fp",
  "profile_mode",
  "selected_profile",
  "blend_alpha",
  "second_threshold",
  "second_tp",
  "second_fn",
  "second_fp",
  "seed_score_mean",
  "seed_score_std",
  "candidates",
] as const satisfies readonly (keyof RunRecord)[];

export type SweepCsvColumn = (typeof SWEEP_CSV_COLUMNS)[number];

const CSV_ROW_TERMINATOR = "\r\n";
const NEEDS_QUOTING = /[",\r\n]/;

// =============================================================================
// FORMATTING
// =============================================================================

export function formatSeedList(seeds: readonly number[]): string {
  return seeds.map(String).join(",");
}

export function formatCsvCell(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatRecordCell(record: RunRecord, column: SweepCsvColumn): string {
  switch (column) {
    case "oof_seeds":
      return record.oof_seeds === undefined ? "" : formatSeedList(record.oof_seeds);
    case "candidates":
      return stringifyAsciiJson(record.candidates, { floatKeys: FLOAT_FIELDS });
    default: {
      const value = record[column];
      if (value === undefined) return "";
      if (typeof value === "number" && FLOAT_FIELDS.has(column)) return formatFloat(value);
      return String(value);
    }
  }
}

export function formatSweepCsv(records: readonly RunRecord[]): string {
  const rows = [
    SWEEP_CSV_COLUMNS.join(","),
    ...records.map((record) =>
      SWEEP_CSV_COLUMNS.map((column) => formatCsvCell(formatRecordCell(record, column))).join(","),
    ),
  ];
  return rows.map((row) => row + CSV_ROW_TERMINATOR).join("");
}

// =============================================================================
// OUTPUT
// =============================================================================

export async function writeSweepCsv(records: readonly RunRecord[], filePath: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, formatSweepCsv(records), "utf8");
}
