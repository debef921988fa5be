import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { InputError, ParseNumberError } from "./errors.js";
import { parseSweepFile, parseSweepLog, type SweepParseEvent } from "./sweep-parser.js";

const FIXTURE_PATH = fileURLToPath(
  new URL("../../test/fixtures/sweep-output.txt", import.meta.url),
);

function lines(...values: string[]): string {
  return values.join("\n");
}

describe("parseSweepLog", () => {
  it("returns nothing for input without recognized lines", () => {
    expect(parseSweepLog("hello\nworld\n")).toEqual({ runs: [], incomplete: [] });
    expect(parseSweepLog("")).toEqual({ runs: [], incomplete: [] });
  });

  it("builds a completed record from a run start through its summary", () => {
    const result = parseSweepLog(
      lines(
        "[1/1] Running sweep_a ...",
        "Second-stage threshold: 0.42",
        "week_sweep_001: booster=0.91, ensemble=0.88, gain=0.03, dur=12.5s",
      ),
    );

    expect(result.incomplete).toEqual([]);
    expect(result.runs).toEqual([
      {
        run_index: 1,
        run_total: 1,
        run_name: "week_sweep_001",
        second_threshold: 0.42,
        booster_score: 0.91,
        ensemble_score: 0.88,
        gain: 0.03,
        duration_s: 12.5,
        candidates: [],
      },
    ]);
  });

  it("discards a run superseded by another run start before its summary", () => {
    const result = parseSweepLog(
      lines(
        "[1/2] Running sweep_a ...",
        "Ensemble aggregation: mean",
        "[2/2] Running sweep_b ...",
        "week_sweep_002: booster=1, ensemble=1, gain=0, dur=1s",
      ),
    );

    expect(result.runs.map((run) => run.run_name)).toEqual(["week_sweep_002"]);
    expect(result.runs[0].ensemble_agg).toBeUndefined();
    expect(result.incomplete).toEqual([]);
  });

  it("reports a run still open at end of input as incomplete exactly once", () => {
    const result = parseSweepLog(
      lines("[1/2] Running sweep_a ...", "[2/2] Running sweep_b ...", "Ensemble aggregation: vote"),
    );

    expect(result.runs).toEqual([]);
    expect(result.incomplete).toEqual([
      {
        run_index: 2,
        run_total: 2,
        run_name: "sweep_b",
        ensemble_agg: "vote",
        candidates: [],
      },
    ]);
  });

  it("opens a record from a bare summary line", () => {
    const result = parseSweepLog(
      lines(
        "Second-stage threshold: 0.9",
        "week_sweep_007: booster=3.5, ensemble=2.5, gain=1.0, dur=4.0s",
      ),
    );

    expect(result.runs).toEqual([
      {
        run_name: "week_sweep_007",
        booster_score: 3.5,
        ensemble_score: 2.5,
        gain: 1,
        duration_s: 4,
        candidates: [],
      },
    ]);
  });

  it("reassembles wrapped lines before matching", () => {
    const result = parseSweepLog(
      lines(
        "[1/1] Running sweep_a ...",
        "Building OOF first-stage features (seeds=[1, 2], \\",
        "folds=4, epochs=8)...",
        "week_sweep_001: booster=1, ensemble=1, gain=0, dur=1s",
      ),
    );

    expect(result.runs[0]).toMatchObject({ oof_seeds: [1, 2], folds: 4, epochs: 8 });
  });

  it("collects candidate rows and skips the header row", () => {
    const result = parseSweepLog(
      lines(
        "[1/1] Running sweep_a ...",
        "Second-stage candidate report:",
        "profile alpha threshold val_score val_tp val_fn val_fp test_score test_tp test_fn test_fp",
        "legacy 0.5 0.40 38.0 40 10 14 39.0 41 9 13",
        "regularized 0.7 0.45 40.0 42 8 12 44.0 44 6 11",
        "Baseline account-level score: 39",
        "legacy 0.1 0.10 1.0 1 1 1 1.0 1 1 1",
        "week_sweep_001: booster=1, ensemble=1, gain=0, dur=1s",
      ),
    );

    const [run] = result.runs;
    expect(run.candidates.map((row) => row.profile)).toEqual(["legacy", "regularized"]);
    expect(run.candidates[1]).toEqual({
      profile: "regularized",
      alpha: 0.7,
      threshold: 0.45,
      val_score: 40,
      val_tp_accounts: 42,
      val_fn_accounts: 8,
      val_fp_accounts: 12,
      test_score: 44,
      test_tp_accounts: 44,
      test_fn_accounts: 6,
      test_fp_accounts: 11,
    });
  });

  it("re-evaluates a non-candidate line that ends the table", () => {
    const result = parseSweepLog(
      lines(
        "[1/1] Running sweep_a ...",
        "Second-stage candidate report:",
        "legacy 0.5 0.40 38.0 40 10 14 39.0 41 9 13",
        "Second-stage selected profile: legacy",
        "legacy 0.9 0.90 1.0 1 1 1 1.0 1 1 1",
        "week_sweep_001: booster=1, ensemble=1, gain=0, dur=1s",
      ),
    );

    const [run] = result.runs;
    expect(run.selected_profile).toBe("legacy");
    expect(run.candidates).toHaveLength(1);
  });

  it("overwrites booster_score from the second-stage score with the summary value", () => {
    const result = parseSweepLog(
      lines(
        "[1/1] Running sweep_a ...",
        "Second-stage test score: 44/50",
        "week_sweep_001: booster=43.0, ensemble=40.0, gain=3.0, dur=1s",
      ),
    );

    expect(result.runs[0].booster_score).toBe(43);
    expect(result.runs[0].booster_max).toBe(50);
  });

  it("aborts on malformed numeric tokens", () => {
    expect(() =>
      parseSweepLog(lines("[1/1] Running sweep_a ...", "Second-stage threshold: 0.4.2")),
    ).toThrow(ParseNumberError);
  });

  it("emits lifecycle events with logical line numbers", () => {
    const events: SweepParseEvent[] = [];
    parseSweepLog(
      lines(
        "[1/3] Running sweep_a ...",
        "week_sweep_001: booster=1, ensemble=1, gain=0, dur=1s",
        "[2/3] Running sweep_b ...",
        "[3/3] Running sweep_c ...",
      ),
      { onEvent: (event) => events.push(event) },
    );

    expect(events).toEqual([
      { type: "run.start", runName: "sweep_a", lineNumber: 1 },
      { type: "run.complete", runName: "week_sweep_001", lineNumber: 2 },
      { type: "run.start", runName: "sweep_b", lineNumber: 3 },
      { type: "run.discarded", runName: "sweep_b", lineNumber: 3 },
      { type: "run.start", runName: "sweep_c", lineNumber: 4 },
      { type: "run.incomplete", runName: "sweep_c", lineNumber: 4 },
    ]);
  });
});

describe("parseSweepFile", () => {
  it("parses the sample sweep output", async () => {
    const events: SweepParseEvent[] = [];
    const result = await parseSweepFile(FIXTURE_PATH, { onEvent: (event) => events.push(event) });

    expect(result.runs.map((run) => run.run_name)).toEqual(["week_sweep_001", "week_sweep_002"]);
    expect(result.runs[0]).toMatchObject({
      run_index: 1,
      run_total: 4,
      booster_score: 44,
      booster_max: 50,
      ensemble_score: 41,
      gain: 3,
      duration_s: 120.5,
      oof_seeds: [3, 5, 7],
      ensemble_agg: "mean",
      ensemble_threshold: 0.35,
      ensemble_accounts: 500,
      seed_score_mean: 40.5,
      seed_score_std: 1.25,
      profile_mode: "auto",
      selected_profile: "regularized",
      blend_alpha: 0.7,
      second_threshold: 0.45,
      second_fp: 11,
    });
    expect(result.runs[0].candidates).toHaveLength(2);
    expect(result.runs[1]).toMatchObject({ oof_seeds: [11], folds: 3, epochs: 10, second_fp: 9 });
    expect(result.incomplete).toEqual([
      {
        run_index: 4,
        run_total: 4,
        run_name: "week_sweep_004",
        candidates: [],
        oof_seeds: [],
        folds: 5,
        epochs: 15,
        second_threshold: 0.3,
      },
    ]);
    expect(events.filter((event) => event.type === "run.discarded")).toEqual([
      { type: "run.discarded", runName: "week_sweep_003", lineNumber: 29 },
    ]);
  });

  it("replaces invalid UTF-8 bytes instead of failing", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sweep-parse-utf8-"));
    const filePath = path.join(dir, "out.txt");
    await fs.writeFile(
      filePath,
      Buffer.concat([
        Buffer.from("[1/1] Running sweep_a ...\nSecond-stage profile mode: auto "),
        Buffer.from([0xff, 0xfe]),
        Buffer.from("\nweek_sweep_001: booster=1, ensemble=1, gain=0, dur=1s\n"),
      ]),
    );

    const result = await parseSweepFile(filePath);

    expect(result.runs[0].profile_mode).toBe("auto \uFFFD\uFFFD");
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("wraps read failures in InputError", async () => {
    await expect(parseSweepFile(path.join(FIXTURE_PATH, "missing.txt"))).rejects.toBeInstanceOf(
      InputError,
    );
  });
});
