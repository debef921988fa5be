/*
Purpose: render errors and warnings for sweep-parse console output.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug })); console.warn(renderCliWarning(msg)).
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = resolveFormatter(options);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderCliWarning(message: string, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options);
  return `${format("Warning:", ["yellow"])} ${message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(options: CliErrorFormatOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
