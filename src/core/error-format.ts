/*
Purpose: turn arbitrary thrown values into structured lines for CLI and log output.
Assumptions: callers decide how lines are rendered (plain, colored, JSON).
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { ConfigError, InputError, ParseNumberError, isUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

const COMMANDER_ERROR_NAMES = new Set(["CommanderError", "InvalidArgumentError"]);

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (isUserFacingError(error)) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: resolveTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (isUserFacingError(error)) {
    lines.push({ kind: "code", text: error.code });
  }
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream?.isTTY) return false;
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false;
  return options.useColor ?? true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof ParseNumberError) return "Parse error";
  if (error instanceof ConfigError) return "Config error";
  if (error instanceof InputError) return "Input error";
  if (error instanceof Error && COMMANDER_ERROR_NAMES.has(error.name)) return "Invalid arguments";
  return "Command failed";
}
