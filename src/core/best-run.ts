import type { RunRecord } from "./sweep-record.js";

export const DEFAULT_TOP_N = 10;

// =============================================================================
// BEST RUN
// =============================================================================

type RunKey = readonly number[];

function bestRunKey(run: RunRecord): RunKey {
  return [
    run.booster_score ?? Number.NEGATIVE_INFINITY,
    run.gain ?? Number.NEGATIVE_INFINITY,
    -(run.second_fp ?? Number.POSITIVE_INFINITY),
  ];
}

function compareKeys(a: RunKey, b: RunKey): number {
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    if (a[i] > b[i]) return 1;
    if (a[i] < b[i]) return -1;
  }
  return 0;
}

/**
 * Highest booster score wins; ties go to the higher gain, then to the fewer
 * second-stage false positives. Full ties keep the earliest run.
 */
export function selectBestRun(runs: readonly RunRecord[]): RunRecord | null {
  let best: RunRecord | null = null;
  let bestKey: RunKey = [];

  for (const run of runs) {
    const key = bestRunKey(run);
    if (best === null || compareKeys(key, bestKey) > 0) {
      best = run;
      bestKey = key;
    }
  }

  return best;
}

// =============================================================================
// TOP RUNS
// =============================================================================

function rankKey(run: RunRecord): RunKey {
  return [run.booster_score ?? -1, run.gain ?? -1];
}

// A negative limit drops that many runs from the end of the ranking.
export function rankTopRuns(runs: readonly RunRecord[], limit: number = DEFAULT_TOP_N): RunRecord[] {
  return [...runs]
    .sort((a, b) => compareKeys(rankKey(b), rankKey(a)))
    .slice(0, limit);
}
