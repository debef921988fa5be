import fse from "fs-extra";

import { selectBestRun } from "../core/best-run.js";
import type { SweepParseConfig } from "../core/config.js";
import { writeSweepCsv } from "../core/csv-writer.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  InputError,
  ParseNumberError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { writeJsonFile } from "../core/json.js";
import { JsonlLogger, logParseEvent } from "../core/logger.js";
import { sweepOutputPaths, type SweepOutputPaths } from "../core/paths.js";
import { parseSweepFile, type SweepParseEvent } from "../core/sweep-parser.js";
import { FLOAT_FIELDS, type ParseResult, type RunRecord } from "../core/sweep-record.js";
import { renderCliWarning } from "./error-format.js";
import { formatBestRun, formatTopRuns } from "./report.js";

// =============================================================================
// TYPES
// =============================================================================

export type ParseCommandResult = ParseResult & {
  best: RunRecord | null;
  paths: SweepOutputPaths;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function parseCommand(
  inputPath: string,
  config: SweepParseConfig,
): Promise<ParseCommandResult> {
  const logger = config.log_file ? new JsonlLogger(config.log_file, { source: inputPath }) : null;

  try {
    logger?.log({ type: "parse.start", payload: { out_dir: config.out_dir } });

    const result = await readSweepLog(inputPath, (event) => {
      if (logger) logParseEvent(logger, event);
      if (event.type === "run.discarded") {
        console.warn(
          renderCliWarning(
            `run ${event.runName} (line ${event.lineNumber}) was superseded before its summary line and discarded`,
          ),
        );
      }
    });

    const paths = sweepOutputPaths(config.out_dir);
    const best = selectBestRun(result.runs);
    const written = await writeOutputs(paths, result, best);
    for (const filePath of written) {
      logger?.log({ type: "output.write", payload: { path: filePath } });
    }

    logger?.log({
      type: "parse.complete",
      payload: { runs: result.runs.length, incomplete: result.incomplete.length },
    });

    printSummary(paths, result, best, config.top_n);
    return { ...result, best, paths };
  } finally {
    logger?.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readSweepLog(
  inputPath: string,
  onEvent: (event: SweepParseEvent) => void,
): Promise<ParseResult> {
  try {
    return await parseSweepFile(inputPath, { onEvent });
  } catch (err) {
    if (err instanceof InputError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Input error",
        message: err.message,
        hint: "Pass the path to a sweep runner output file.",
        cause: err.cause,
      });
    }
    if (err instanceof ParseNumberError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.parse,
        title: "Parse error",
        message: err.message,
        hint: "Numeric fields must be plain numbers; no output was written.",
        cause: err,
      });
    }
    throw err;
  }
}

async function writeOutputs(
  paths: SweepOutputPaths,
  result: ParseResult,
  best: RunRecord | null,
): Promise<string[]> {
  const written: string[] = [];

  try {
    await fse.ensureDir(paths.outDir);

    await writeSweepCsv(result.runs, paths.csv);
    written.push(paths.csv);

    if (best) {
      await writeJsonFile(paths.best, best, { floatKeys: FLOAT_FIELDS });
      written.push(paths.best);
    }

    if (result.incomplete.length > 0) {
      await writeJsonFile(paths.incomplete, result.incomplete, { floatKeys: FLOAT_FIELDS });
      written.push(paths.incomplete);
    }
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.output,
      title: "Output error",
      message: `Failed to write results to ${paths.outDir}: ${formatErrorMessage(err)}`,
      next: "Check that --out-dir points to a writable directory.",
      cause: err,
    });
  }

  return written;
}

function printSummary(
  paths: SweepOutputPaths,
  result: ParseResult,
  best: RunRecord | null,
  topN: number,
): void {
  console.log(`Parsed runs: ${result.runs.length}`);
  if (result.incomplete.length > 0) {
    console.log(`Incomplete runs: ${result.incomplete.length} (saved to ${paths.incomplete})`);
  }
  console.log(`CSV: ${paths.csv}`);
  if (best) {
    console.log(formatBestRun(best));
  }

  for (const line of formatTopRuns(result.runs, topN)) {
    console.log(line);
  }
}
