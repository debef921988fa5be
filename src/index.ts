#!/usr/bin/env node
import { CommanderError, type Command } from "commander";

import { isEntryModule } from "./cli/entry.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

const INFORMATIONAL_EXITS = new Set([
  "commander.helpDisplayed",
  "commander.help",
  "commander.version",
]);

// =============================================================================
// EXIT HANDLING
// =============================================================================

// Commander reports through thrown CommanderErrors; main() prints them.
function routeCommanderFailures(program: Command): void {
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();
}

function isInformationalExit(error: unknown): error is CommanderError {
  return error instanceof CommanderError && INFORMATIONAL_EXITS.has(error.code);
}

function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

function wantsDebugOutput(argv: readonly string[], program: Command): boolean {
  return resolveDebugFlagFromArgv(argv) ?? Boolean(program.opts<{ debug?: boolean }>().debug);
}

// =============================================================================
// MAIN
// =============================================================================

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  routeCommanderFailures(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isInformationalExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: wantsDebugOutput(argv, program) }));
    process.exitCode = exitCodeFor(error);
  }
}

if (isEntryModule(import.meta.url, process.argv[1])) {
  void main(process.argv);
}
