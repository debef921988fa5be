import path from "node:path";

import fse from "fs-extra";

import { formatFloat } from "./numbers.js";

const ESCAPED_CHARS = /[\u007f-\uffff]/g;

export type AsciiJsonOptions = {
  // Multi-line output with this many spaces per level; single-line when unset.
  indent?: number;
  // Numbers under these keys are written as floats (`44.0`).
  floatKeys?: ReadonlySet<string>;
};

/**
 * JSON with every non-ASCII character written as a \uXXXX escape.
 * Single-line output separates items with `", "` and keys with `": "`;
 * non-finite numbers are written as `Infinity`, `-Infinity` and `NaN`.
 */
export function stringifyAsciiJson(value: unknown, options: AsciiJsonOptions = {}): string {
  return encodeValue(value, null, 0, options);
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: Omit<AsciiJsonOptions, "indent"> = {},
): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, stringifyAsciiJson(data, { ...options, indent: 2 }) + "\n", "utf8");
}

// =============================================================================
// INTERNALS
// =============================================================================

function encodeValue(
  value: unknown,
  key: string | null,
  depth: number,
  options: AsciiJsonOptions,
): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return encodeString(value);
  if (typeof value === "number") {
    return encodeNumber(value, key !== null && (options.floatKeys?.has(key) ?? false));
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => encodeValue(item, null, depth + 1, options));
    return wrapItems("[", "]", items, depth, options.indent);
  }

  if (typeof value === "object") {
    const items = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .map(
        ([entryKey, entry]) =>
          `${encodeString(entryKey)}: ${encodeValue(entry, entryKey, depth + 1, options)}`,
      );
    return wrapItems("{", "}", items, depth, options.indent);
  }

  throw new TypeError(`Cannot write a ${typeof value} value as JSON`);
}

function encodeString(value: string): string {
  return JSON.stringify(value).replace(
    ESCAPED_CHARS,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
}

function encodeNumber(value: number, isFloat: boolean): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "Infinity";
  if (value === Number.NEGATIVE_INFINITY) return "-Infinity";
  return isFloat ? formatFloat(value) : String(value);
}

function wrapItems(
  open: string,
  close: string,
  items: readonly string[],
  depth: number,
  indent: number | undefined,
): string {
  if (items.length === 0) return `${open}${close}`;
  if (indent === undefined) return `${open}${items.join(", ")}${close}`;

  const itemPrefix = `\n${" ".repeat(indent * (depth + 1))}`;
  const closePrefix = `\n${" ".repeat(indent * depth)}`;
  return `${open}${itemPrefix}${items.join(`,${itemPrefix}`)}${closePrefix}${close}`;
}
