/*
Purpose: error types raised by the configuration engine and rendered by the CLI.
Assumptions: UserFacingError instances are safe to display to end users; the typed
StrataError subclasses travel as their `cause`.
Usage: throw new UserFacingError({ code, title, message, hint, cause: new SelectionError("...") }).
*/

// =============================================================================
// ENGINE ERRORS
// =============================================================================

export class StrataError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "StrataError";
  }
}

export class SchemaError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SchemaError";
  }
}

export class VariableError extends StrataError {
  constructor(
    message: string,
    public readonly variable: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "VariableError";
  }
}

export class SelectionError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SelectionError";
  }
}

export class LayerError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LayerError";
  }
}

export class EmissionError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "EmissionError";
  }
}

export class FetchError extends StrataError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly output: string,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  schema: "SCHEMA_ERROR",
  variable: "VARIABLE_ERROR",
  selection: "SELECTION_ERROR",
  layer: "LAYER_ERROR",
  emission: "EMISSION_ERROR",
  fetch: "FETCH_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function isUserFacingError(
  error: unknown,
  code?: UserFacingErrorCode,
): error is UserFacingError {
  if (!(error instanceof UserFacingError)) return false;
  return code === undefined || error.code === code;
}
