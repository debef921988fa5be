/*
Purpose: ordered field extractors applied to each logical line of a sweep log.
Assumptions: the caller owns the open record and tries extractors in array order,
stopping at the first match.
Usage: applyFieldPatterns(line, record, lineNumber) -> matched extractor name or null.
*/

import { parseFloatField, parseIntField, parseSeedList } from "./numbers.js";
import type { RunRecord } from "./sweep-record.js";

// =============================================================================
// TYPES
// =============================================================================

export type FieldExtractor = {
  name: string;
  pattern: RegExp;
  apply: (groups: CaptureGroups, record: RunRecord, lineNumber: number) => void;
};

type CaptureGroups = readonly string[];

export type SummaryLine = {
  runName: string;
  boosterScore: number;
  ensembleScore: number;
  gain: number;
  durationS: number;
};

// =============================================================================
// LINE PATTERNS
// =============================================================================

export const RUN_START_PATTERN = /^\[(\d+)\/(\d+)\] Running (\S+) \.\.\.$/;

export const SUMMARY_PATTERN =
  /^(week_sweep_\d+): booster=([0-9.]+), ensemble=([0-9.]+), gain=([-0-9.]+), dur=([0-9.]+)s/;

export const CANDIDATE_REPORT_HEADER = "Second-stage candidate report";
export const CANDIDATE_REPORT_END = "Baseline account-level";

export const FIELD_EXTRACTORS: readonly FieldExtractor[] = [
  {
    name: "oof",
    pattern:
      /Building OOF first-stage features.*seeds=\[(.*?)\], folds=(\d+), epochs=(\d+)\)\.\.\./,
    apply: ([seeds, folds, epochs], record, lineNumber) => {
      record.oof_seeds = parseSeedList(seeds, { field: "oof_seeds", lineNumber });
      record.folds = parseIntField(folds, { field: "folds", lineNumber });
      record.epochs = parseIntField(epochs, { field: "epochs", lineNumber });
    },
  },
  {
    name: "ensemble_agg",
    pattern: /Ensemble aggregation: (\w+)/,
    apply: ([agg], record) => {
      record.ensemble_agg = agg;
    },
  },
  {
    name: "ensemble_threshold",
    pattern: /Ensemble selected threshold: ([0-9.]+)/,
    apply: ([threshold], record, lineNumber) => {
      record.ensemble_threshold = parseFloatField(threshold, {
        field: "ensemble_threshold",
        lineNumber,
      });
    },
  },
  {
    name: "ensemble_score",
    pattern: /Ensemble test score: (\d+) \(TP=(\d+), FN=(\d+), FP=(\d+), accounts=(\d+)\)/,
    apply: ([score, tp, fn, fp, accounts], record, lineNumber) => {
      record.ensemble_score = parseFloatField(score, { field: "ensemble_score", lineNumber });
      record.ensemble_tp = parseIntField(tp, { field: "ensemble_tp", lineNumber });
      record.ensemble_fn = parseIntField(fn, { field: "ensemble_fn", lineNumber });
      record.ensemble_fp = parseIntField(fp, { field: "ensemble_fp", lineNumber });
      record.ensemble_accounts = parseIntField(accounts, {
        field: "ensemble_accounts",
        lineNumber,
      });
    },
  },
  {
    name: "seed_score",
    pattern: /Seed score mean\/std: ([0-9.]+) \/ ([0-9.]+)/,
    apply: ([mean, std], record, lineNumber) => {
      record.seed_score_mean = parseFloatField(mean, { field: "seed_score_mean", lineNumber });
      record.seed_score_std = parseFloatField(std, { field: "seed_score_std", lineNumber });
    },
  },
  {
    name: "profile_mode",
    pattern: /Second-stage profile mode: (.+)$/,
    apply: ([mode], record) => {
      record.profile_mode = mode;
    },
  },
  {
    name: "selected_profile",
    pattern: /Second-stage selected profile: (.+)$/,
    apply: ([profile], record) => {
      record.selected_profile = profile;
    },
  },
  {
    name: "blend_alpha",
    pattern: /Second-stage blend alpha \(CatBoost weight\): ([0-9.]+)/,
    apply: ([alpha], record, lineNumber) => {
      record.blend_alpha = parseFloatField(alpha, { field: "blend_alpha", lineNumber });
    },
  },
  {
    name: "second_threshold",
    pattern: /Second-stage threshold: ([0-9.]+)/,
    apply: ([threshold], record, lineNumber) => {
      record.second_threshold = parseFloatField(threshold, {
        field: "second_threshold",
        lineNumber,
      });
    },
  },
  {
    name: "second_score",
    pattern: /Second-stage test score: (\d+)\/(\d+)/,
    apply: ([score, max], record, lineNumber) => {
      record.booster_score = parseFloatField(score, { field: "booster_score", lineNumber });
      record.booster_max = parseIntField(max, { field: "booster_max", lineNumber });
    },
  },
  {
    name: "second_confusion",
    pattern: /Second-stage confusion components -> TP=(\d+), FN=(\d+), FP=(\d+)/,
    apply: ([tp, fn, fp], record, lineNumber) => {
      record.second_tp = parseIntField(tp, { field: "second_tp", lineNumber });
      record.second_fn = parseIntField(fn, { field: "second_fn", lineNumber });
      record.second_fp = parseIntField(fp, { field: "second_fp", lineNumber });
    },
  },
];

// =============================================================================
// MATCHING
// =============================================================================

export function applyFieldPatterns(
  line: string,
  record: RunRecord,
  lineNumber: number,
): string | null {
  for (const extractor of FIELD_EXTRACTORS) {
    const match = extractor.pattern.exec(line);
    if (!match) continue;

    extractor.apply(captureGroups(match), record, lineNumber);
    return extractor.name;
  }

  return null;
}

export function matchSummaryLine(line: string, lineNumber: number): SummaryLine | null {
  const match = SUMMARY_PATTERN.exec(line);
  if (!match) return null;

  const [runName, booster, ensemble, gain, duration] = captureGroups(match);
  return {
    runName,
    boosterScore: parseFloatField(booster, { field: "booster_score", lineNumber }),
    ensembleScore: parseFloatField(ensemble, { field: "ensemble_score", lineNumber }),
    gain: parseFloatField(gain, { field: "gain", lineNumber }),
    durationS: parseFloatField(duration, { field: "duration_s", lineNumber }),
  };
}

function captureGroups(match: RegExpExecArray): CaptureGroups {
  return match.slice(1).map((group) => group ?? "");
}
