/*
Purpose: group sweep runner log lines into per-run records.
Assumptions: the whole log fits in memory; a run is complete only once its
`week_sweep_<n>: booster=...` summary line has been seen.
Usage: const { runs, incomplete } = parseSweepLog(text, { onEvent });
*/

import fse from "fs-extra";

import { classifyCandidateLine } from "./candidate-table.js";
import { joinContinuationLines, splitLogLines } from "./continuation.js";
import { InputError } from "./errors.js";
import {
  CANDIDATE_REPORT_HEADER,
  RUN_START_PATTERN,
  SUMMARY_PATTERN,
  applyFieldPatterns,
  matchSummaryLine,
} from "./line-patterns.js";
import { parseIntField } from "./numbers.js";
import type { ParseResult, RunRecord } from "./sweep-record.js";

// =============================================================================
// TYPES
// =============================================================================

export type SweepParseEventType =
  | "run.start"
  | "run.complete"
  | "run.discarded"
  | "run.incomplete";

export type SweepParseEvent = {
  type: SweepParseEventType;
  runName: string;
  lineNumber: number;
};

export type SweepParseOptions = {
  onEvent?: (event: SweepParseEvent) => void;
};

type OpenRun = {
  record: RunRecord;
  startLine: number;
};

// =============================================================================
// PARSER
// =============================================================================

export function parseSweepLog(text: string, options: SweepParseOptions = {}): ParseResult {
  const emit = options.onEvent ?? (() => undefined);
  const lines = joinContinuationLines(splitLogLines(text));

  const runs: RunRecord[] = [];
  const incomplete: RunRecord[] = [];
  let current: OpenRun | null = null;
  let inCandidates = false;

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;

    const start = RUN_START_PATTERN.exec(line);
    if (start) {
      if (current) {
        // Superseded before its summary line; the record is dropped, not reported incomplete.
        emit({
          type: "run.discarded",
          runName: current.record.run_name,
          lineNumber: current.startLine,
        });
      }
      current = {
        record: {
          run_index: parseIntField(start[1], { field: "run_index", lineNumber }),
          run_total: parseIntField(start[2], { field: "run_total", lineNumber }),
          run_name: start[3],
          candidates: [],
        },
        startLine: lineNumber,
      };
      inCandidates = false;
      emit({ type: "run.start", runName: start[3], lineNumber });
      continue;
    }

    if (!current) {
      const summary = SUMMARY_PATTERN.exec(line);
      if (!summary) continue;

      current = { record: { run_name: summary[1], candidates: [] }, startLine: lineNumber };
      emit({ type: "run.start", runName: summary[1], lineNumber });
    }

    if (line.trim().startsWith(CANDIDATE_REPORT_HEADER)) {
      inCandidates = true;
      continue;
    }

    if (inCandidates) {
      const candidate = classifyCandidateLine(line, lineNumber);
      switch (candidate.kind) {
        case "end":
          inCandidates = false;
          continue;
        case "header":
          continue;
        case "row":
          current.record.candidates.push(candidate.row);
          continue;
        case "other":
          inCandidates = false;
          break;
      }
    }

    if (applyFieldPatterns(line, current.record, lineNumber) !== null) {
      continue;
    }

    const summary = matchSummaryLine(line, lineNumber);
    if (summary) {
      const { record } = current;
      record.run_name = summary.runName;
      record.booster_score = summary.boosterScore;
      record.ensemble_score = summary.ensembleScore;
      record.gain = summary.gain;
      record.duration_s = summary.durationS;
      runs.push(record);
      current = null;
      emit({ type: "run.complete", runName: summary.runName, lineNumber });
    }
  }

  if (current) {
    incomplete.push(current.record);
    emit({
      type: "run.incomplete",
      runName: current.record.run_name,
      lineNumber: current.startLine,
    });
  }

  return { runs, incomplete };
}

export async function parseSweepFile(
  filePath: string,
  options: SweepParseOptions = {},
): Promise<ParseResult> {
  let buffer: Buffer;
  try {
    buffer = await fse.readFile(filePath);
  } catch (err) {
    throw new InputError(`Failed to read sweep log: ${filePath}`, err);
  }

  // Buffer decoding substitutes U+FFFD for invalid UTF-8 sequences.
  return parseSweepLog(buffer.toString("utf8"), options);
}
