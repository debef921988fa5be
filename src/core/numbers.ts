import { ParseNumberError } from "./errors.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOATS = new Map<string, number>([
  ["inf", Infinity],
  ["+inf", Infinity],
  ["-inf", -Infinity],
  ["infinity", Infinity],
  ["+infinity", Infinity],
  ["-infinity", -Infinity],
  ["nan", NaN],
  ["+nan", NaN],
  ["-nan", NaN],
]);

export type NumberContext = {
  field: string;
  lineNumber?: number;
};

export function parseIntField(raw: string, ctx: NumberContext): number {
  const token = raw.trim();
  if (!INTEGER_PATTERN.test(token)) {
    throw new ParseNumberError(ctx.field, raw, ctx.lineNumber);
  }
  return Number.parseInt(token, 10);
}

export function parseFloatField(raw: string, ctx: NumberContext): number {
  const token = raw.trim();
  if (FLOAT_PATTERN.test(token)) {
    return Number(token);
  }

  const special = SPECIAL_FLOATS.get(token.toLowerCase());
  if (special !== undefined) {
    return special;
  }

  throw new ParseNumberError(ctx.field, raw, ctx.lineNumber);
}

export function parseSeedList(raw: string, ctx: NumberContext): number[] {
  const trimmed = raw.trim();
  if (!trimmed) return [];

  return trimmed
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => parseIntField(part, ctx));
}

// =============================================================================
// FORMATTING
// =============================================================================

const FIXED_NOTATION_MIN_EXPONENT = -4;
const FIXED_NOTATION_MAX_EXPONENT = 16;

/**
 * Shortest round-trip text for a float field. Integral values keep a `.0`
 * suffix, very large or small magnitudes switch to `1.5e+16` style, and
 * non-finite values print as `inf`, `-inf` and `nan`.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Number.POSITIVE_INFINITY) return "inf";
  if (value === Number.NEGATIVE_INFINITY) return "-inf";

  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const [mantissa, exponentText] = Math.abs(value).toExponential().split("e");
  const digits = mantissa.replace(".", "");
  const exponent = Number(exponentText);

  if (exponent < FIXED_NOTATION_MIN_EXPONENT || exponent >= FIXED_NOTATION_MAX_EXPONENT) {
    const fraction = digits.length > 1 ? `.${digits.slice(1)}` : "";
    const exponentSign = exponent < 0 ? "-" : "+";
    const exponentDigits = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${digits.charAt(0)}${fraction}e${exponentSign}${exponentDigits}`;
  }

  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }

  const integerLength = exponent + 1;
  if (digits.length <= integerLength) {
    return `${sign}${digits.padEnd(integerLength, "0")}.0`;
  }
  return `${sign}${digits.slice(0, integerLength)}.${digits.slice(integerLength)}`;
}
