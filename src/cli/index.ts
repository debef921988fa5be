import { Command, InvalidArgumentError } from "commander";

import { TopNSchema, resolveConfig, type SweepParseConfig } from "../core/config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { parseCommand } from "./parse.js";

type ParseCliOptions = {
  outDir?: string;
  topN?: number;
  config?: string;
  logFile?: string;
  debug?: boolean;
};

export function parseTopNOption(value: string): number {
  const parsed = TopNSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed.data;
}

function resolveCliConfig(opts: ParseCliOptions): SweepParseConfig {
  try {
    return resolveConfig({
      configPath: opts.config,
      cli: { outDir: opts.outDir, topN: opts.topN, logFile: opts.logFile },
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config error",
        message: err.message,
        hint: "Check the --config file and any SWEEP_PARSE_* environment variables.",
        cause: err.cause,
      });
    }
    throw err;
  }
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name("sweep-parse")
    .description("Parse booster sweep output logs into CSV and JSON summaries")
    .version("0.1.0")
    .argument("<input>", "Path to sweep output txt")
    .option("--out-dir <dir>", "Directory for parsed outputs (default: artifacts)")
    .option("--top-n <n>", "Number of top runs to print (default: 10)", parseTopNOption)
    .option("--config <path>", "YAML config with out_dir, top_n and log_file defaults")
    .option("--log-file <path>", "Append JSONL parse events to this file")
    .option("--debug", "Show stack traces and error details")
    .option("--no-debug", "Hide stack traces and error details")
    .action(async (input: string, opts: ParseCliOptions) => {
      await parseCommand(input, resolveCliConfig(opts));
    });

  return program;
}
