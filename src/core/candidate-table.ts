import { CANDIDATE_REPORT_END } from "./line-patterns.js";
import { parseFloatField, parseIntField } from "./numbers.js";
import { isCandidateProfile, type CandidateRow } from "./sweep-record.js";

const MIN_CANDIDATE_TOKENS = 11;
const CANDIDATE_HEADER_TOKEN = "profile";

// =============================================================================
// TYPES
// =============================================================================

export type CandidateLineResult =
  | { kind: "end" }
  | { kind: "header" }
  | { kind: "row"; row: CandidateRow }
  | { kind: "other" };

// =============================================================================
// CANDIDATE TABLE
// =============================================================================

export function classifyCandidateLine(line: string, lineNumber: number): CandidateLineResult {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith(CANDIDATE_REPORT_END)) {
    return { kind: "end" };
  }

  const tokens = trimmed.split(/\s+/);
  if (tokens[0] === CANDIDATE_HEADER_TOKEN) {
    return { kind: "header" };
  }

  const row = parseCandidateRow(tokens, lineNumber);
  return row ? { kind: "row", row } : { kind: "other" };
}

export function parseCandidateRow(tokens: readonly string[], lineNumber: number): CandidateRow | null {
  const [profile] = tokens;
  if (profile === undefined || !isCandidateProfile(profile)) return null;
  if (tokens.length < MIN_CANDIDATE_TOKENS) return null;

  const float = (index: number, field: string): number =>
    parseFloatField(tokens[index], { field: `candidates.${field}`, lineNumber });
  const int = (index: number, field: string): number =>
    parseIntField(tokens[index], { field: `candidates.${field}`, lineNumber });

  return {
    profile,
    alpha: float(1, "alpha"),
    threshold: float(2, "threshold"),
    val_score: float(3, "val_score"),
    val_tp_accounts: int(4, "val_tp_accounts"),
    val_fn_accounts: int(5, "val_fn_accounts"),
    val_fp_accounts: int(6, "val_fp_accounts"),
    test_score: float(7, "test_score"),
    test_tp_accounts: int(8, "test_tp_accounts"),
    test_fn_accounts: int(9, "test_fn_accounts"),
    test_fp_accounts: int(10, "test_fp_accounts"),
  };
}
