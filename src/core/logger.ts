import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import type { SweepParseEvent } from "./sweep-parser.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  source?: string;
  run_name?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  source?: string;
  runName?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  source?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveDebugFlagFromArgv(process.argv) ?? false;
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { source: providedSource, runName, payload, ts, type, ...rest } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : new Date().toISOString();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
  };

  const source = providedSource ?? defaults.source;
  if (source) {
    result.source = source;
  }
  if (runName) {
    result.run_name = runName;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logParseEvent(logger: JsonlLogger, event: SweepParseEvent): void {
  logger.log({
    type: event.type,
    runName: event.runName,
    payload: { line: event.lineNumber },
  });
}

export function resolveDebugFlagFromArgv(argv: readonly string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
