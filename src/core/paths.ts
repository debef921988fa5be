import path from "node:path";

export const PARSED_CSV_FILENAME = "booster_sweep_parsed.csv";
export const BEST_JSON_FILENAME = "booster_sweep_best.json";
export const INCOMPLETE_JSON_FILENAME = "booster_sweep_incomplete.json";

export type SweepOutputPaths = {
  outDir: string;
  csv: string;
  best: string;
  incomplete: string;
};

export function sweepOutputPaths(outDir: string): SweepOutputPaths {
  return {
    outDir,
    csv: path.join(outDir, PARSED_CSV_FILENAME),
    best: path.join(outDir, BEST_JSON_FILENAME),
    incomplete: path.join(outDir, INCOMPLETE_JSON_FILENAME),
  };
}
