// =============================================================================
// CANDIDATES
// =============================================================================

export const CANDIDATE_PROFILES = ["legacy", "regularized"] as const;

export type CandidateProfile = (typeof CANDIDATE_PROFILES)[number];

export type CandidateRow = {
  profile: CandidateProfile;
  alpha: number;
  threshold: number;
  val_score: number;
  val_tp_accounts: number;
  val_fn_accounts: number;
  val_fp_accounts: number;
  test_score: number;
  test_tp_accounts: number;
  test_fn_accounts: number;
  test_fp_accounts: number;
};

export function isCandidateProfile(value: string): value is CandidateProfile {
  return CANDIDATE_PROFILES.some((profile) => profile === value);
}

// =============================================================================
// RUN RECORDS
// =============================================================================

// Fields appear only once a matching log line was seen; nothing is defaulted.
export type RunRecord = {
  run_index?: number;
  run_total?: number;
  run_name: string;
  booster_score?: number;
  booster_max?: number;
  ensemble_score?: number;
  gain?: number;
  duration_s?: number;
  oof_seeds?: number[];
  folds?: number;
  epochs?: number;
  ensemble_agg?: string;
  ensemble_threshold?: number;
  ensemble_tp?: number;
  ensemble_fn?: number;
  ensemble_fp?: number;
  ensemble_accounts?: number;
  profile_mode?: string;
  selected_profile?: string;
  blend_alpha?: number;
  second_threshold?: number;
  second_tp?: number;
  second_fn?: number;
  second_fp?: number;
  seed_score_mean?: number;
  seed_score_std?: number;
  candidates: CandidateRow[];
};

// Fields parsed as floats; writers keep a fractional part on integral values.
const RUN_FLOAT_FIELDS = [
  "booster_score",
  "ensemble_score",
  "gain",
  "duration_s",
  "ensemble_threshold",
  "blend_alpha",
  "second_threshold",
  "seed_score_mean",
  "seed_score_std",
] as const satisfies readonly (keyof RunRecord)[];

const CANDIDATE_FLOAT_FIELDS = [
  "alpha",
  "threshold",
  "val_score",
  "test_score",
] as const satisfies readonly (keyof CandidateRow)[];

export const FLOAT_FIELDS: ReadonlySet<string> = new Set<string>([
  ...RUN_FLOAT_FIELDS,
  ...CANDIDATE_FLOAT_FIELDS,
]);

export type ParseResult = {
  runs: RunRecord[];
  incomplete: RunRecord[];
};
