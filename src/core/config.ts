import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { z } from "zod";

import { DEFAULT_TOP_N } from "./best-run.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_OUT_DIR = "artifacts";

export const ENV_OUT_DIR = "SWEEP_PARSE_OUT_DIR";
export const ENV_TOP_N = "SWEEP_PARSE_TOP_N";

// =============================================================================
// SCHEMA
// =============================================================================

export const SweepParseConfigSchema = z
  .object({
    out_dir: z.string().min(1).default(DEFAULT_OUT_DIR),
    top_n: z.number().int().default(DEFAULT_TOP_N),
    log_file: z.string().min(1).nullable().default(null),
  })
  .strict();

export type SweepParseConfig = z.infer<typeof SweepParseConfigSchema>;

export type SweepParseOverrides = {
  outDir?: string;
  topN?: number;
  logFile?: string;
};

export const TopNSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform((value) => Number.parseInt(value, 10));

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// LOADING
// =============================================================================

export function loadConfigFile(configPath: string): SweepParseConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found at: ${configPath}`);
  }

  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  const expanded = expandEnv(doc ?? {}, { file: configPath, trail: [] });
  const parsed = SweepParseConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${configPath}\n${formatIssues(parsed.error.issues)}`);
  }

  return parsed.data;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): SweepParseOverrides {
  const overrides: SweepParseOverrides = {};

  const outDir = env[ENV_OUT_DIR]?.trim();
  if (outDir) {
    overrides.outDir = outDir;
  }

  const topN = env[ENV_TOP_N]?.trim();
  if (topN) {
    const parsed = TopNSchema.safeParse(topN);
    if (!parsed.success) {
      throw new ConfigError(`${ENV_TOP_N} must be an integer (got "${topN}").`);
    }
    overrides.topN = parsed.data;
  }

  return overrides;
}

/**
 * Precedence: CLI flags, then SWEEP_PARSE_* environment, then the config file,
 * then built-in defaults.
 */
export function resolveConfig(args: {
  configPath?: string;
  cli?: SweepParseOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): SweepParseConfig {
  const cwd = args.cwd ?? process.cwd();
  const base = args.configPath
    ? loadConfigFile(path.resolve(cwd, args.configPath))
    : SweepParseConfigSchema.parse({});
  const env = readEnvOverrides(args.env);
  const cli = args.cli ?? {};

  return {
    out_dir: cli.outDir ?? env.outDir ?? base.out_dir,
    top_n: cli.topN ?? env.topN ?? base.top_n,
    log_file: cli.logFile ?? base.log_file,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `- ${location}: ${issue.message}`;
    })
    .join("\n");
}
