/*
Purpose: render console summaries for parsed sweep runs.
Assumptions: records come from parseSweepLog; absent fields print as "None".
Usage: console.log(formatBestRun(best)); formatTopRuns(runs, 10).forEach(console.log).
*/

import { rankTopRuns } from "../core/best-run.js";
import { formatFloat } from "../core/numbers.js";
import type { RunRecord } from "../core/sweep-record.js";

// =============================================================================
// VALUES
// =============================================================================

export function formatReportValue(value: string | number | readonly number[] | undefined): string {
  if (value === undefined) return "None";
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return `[${value.join(", ")}]`;
}

export function formatReportFloat(value: number | undefined): string {
  return value === undefined ? "None" : formatFloat(value);
}

// =============================================================================
// LINES
// =============================================================================

export function formatBestRun(run: RunRecord): string {
  return [
    `Best: ${run.run_name}`,
    `booster=${formatReportFloat(run.booster_score)}`,
    `gain=${formatReportFloat(run.gain)}`,
    `profile=${formatReportValue(run.selected_profile)}`,
    `threshold=${formatReportFloat(run.second_threshold)}`,
    `seeds=${formatReportValue(run.oof_seeds)}`,
    `folds=${formatReportValue(run.folds)}`,
    `epochs=${formatReportValue(run.epochs)}`,
  ].join(" ");
}

export function formatTopRunLine(run: RunRecord): string {
  return [
    `  ${run.run_name}`,
    `booster=${formatReportFloat(run.booster_score)}`,
    `gain=${formatReportFloat(run.gain)}`,
    `profile=${formatReportValue(run.selected_profile)}`,
    `thr=${formatReportFloat(run.second_threshold)}`,
    `seeds=${formatReportValue(run.oof_seeds)}`,
    `folds=${formatReportValue(run.folds)}`,
    `epochs=${formatReportValue(run.epochs)}`,
  ].join(" ");
}

export function formatTopRuns(runs: readonly RunRecord[], limit: number): string[] {
  return ["Top runs:", ...rankTopRuns(runs, limit).map(formatTopRunLine)];
}
