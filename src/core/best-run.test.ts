import { describe, expect, it } from "vitest";

import { rankTopRuns, selectBestRun } from "./best-run.js";
import type { RunRecord } from "./sweep-record.js";

function run(name: string, fields: Partial<RunRecord> = {}): RunRecord {
  return { run_name: name, candidates: [], ...fields };
}

describe("selectBestRun", () => {
  it("returns null for no runs", () => {
    expect(selectBestRun([])).toBeNull();
  });

  it("breaks booster ties by higher gain", () => {
    const runs = [
      run("a", { booster_score: 0.8, gain: 1 }),
      run("b", { booster_score: 0.9, gain: 2 }),
      run("c", { booster_score: 0.9, gain: 3 }),
    ];

    expect(selectBestRun(runs)?.gain).toBe(3);
  });

  it("breaks remaining ties by fewer second-stage false positives", () => {
    const runs = [
      run("a", { booster_score: 0.9, gain: 2, second_fp: 12 }),
      run("b", { booster_score: 0.9, gain: 2, second_fp: 4 }),
      run("c", { booster_score: 0.9, gain: 2 }),
    ];

    expect(selectBestRun(runs)?.run_name).toBe("b");
  });

  it("treats a missing booster score as the worst possible", () => {
    const runs = [run("a", { gain: 100 }), run("b", { booster_score: -5, gain: 0 })];

    expect(selectBestRun(runs)?.run_name).toBe("b");
  });

  it("keeps the first run on a full tie", () => {
    const runs = [
      run("a", { booster_score: 1, gain: 1, second_fp: 1 }),
      run("b", { booster_score: 1, gain: 1, second_fp: 1 }),
    ];

    expect(selectBestRun(runs)?.run_name).toBe("a");
  });
});

describe("rankTopRuns", () => {
  const runs = [
    run("low", { booster_score: 0.5, gain: 0.2 }),
    run("missing"),
    run("high-gain", { booster_score: 0.9, gain: 0.3 }),
    run("high", { booster_score: 0.9, gain: 0.1 }),
  ];

  it("orders by booster score then gain, descending", () => {
    expect(rankTopRuns(runs).map((r) => r.run_name)).toEqual([
      "high-gain",
      "high",
      "low",
      "missing",
    ]);
  });

  it("limits the result to the requested count", () => {
    expect(rankTopRuns(runs, 2).map((r) => r.run_name)).toEqual(["high-gain", "high"]);
  });

  it("places missing scores after negative ones above -1", () => {
    const ranked = rankTopRuns([run("missing"), run("negative", { booster_score: -0.5 })]);
    expect(ranked.map((r) => r.run_name)).toEqual(["negative", "missing"]);
  });

  it("does not reorder the input", () => {
    rankTopRuns(runs, 1);
    expect(runs[0].run_name).toBe("low");
  });
});
