export class SweepParseError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SweepParseError";
  }
}

export class ConfigError extends SweepParseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class InputError extends SweepParseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InputError";
  }
}

export class ParseNumberError extends SweepParseError {
  constructor(
    public readonly field: string,
    public readonly raw: string,
    public readonly lineNumber: number | undefined,
  ) {
    const location = lineNumber === undefined ? "" : ` on line ${lineNumber}`;
    super(`Invalid numeric value for ${field}${location}: "${raw}"`);
    this.name = "ParseNumberError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  parse: "PARSE_ERROR",
  output: "OUTPUT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorOptions = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends SweepParseError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(options: UserFacingErrorOptions) {
    super(options.message, options.cause);
    this.name = "UserFacingError";
    this.code = options.code;
    this.title = options.title;
    this.hint = options.hint;
    this.next = options.next;
  }
}

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}
