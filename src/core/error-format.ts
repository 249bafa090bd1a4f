/*
Purpose: turn any thrown value into labelled lines for the CLI error stream.
Assumptions: debug mode may include codes, causes and stack traces; color only on a TTY.
Usage: printErrorReport(err, { mode: "debug", stream: process.stderr }).
*/

import {
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
  type UserFacingErrorInput,
} from "./errors.js";

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

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type ErrorStream = {
  isTTY?: boolean;
  write: (chunk: string) => unknown;
};

// =============================================================================
// ANSI
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = toUserFacingInput(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if ((options.mode ?? "short") !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });

  const name = error instanceof Error ? cleanText(error.name) : undefined;
  if (name) lines.push({ kind: "name", text: name });

  const cause = describeCause(normalized.cause, normalized.message);
  if (cause) lines.push({ kind: "cause", text: cause });

  const stack = firstStack(error, normalized.cause);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return cleanText(error.message) ?? cleanText(error.name) ?? String(error);
  }
  if (typeof error === "string") return error;
  return String(error);
}

export function printErrorReport(
  error: unknown,
  options: { mode?: ErrorFormatMode; stream?: ErrorStream; useColor?: boolean } = {},
): void {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  for (const line of formatErrorLines(error, { mode: options.mode })) {
    stream.write(`${renderLine(line, format)}\n`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";
const KNOWN_CODES = new Set<string>(Object.values(USER_FACING_ERROR_CODES));

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return format(`Error: ${line.text}`, ["bold", "red"]);
    case "hint":
      return format(`Hint: ${line.text}`, ["yellow"]);
    case "next":
      return format(`Next: ${line.text}`, ["cyan"]);
    case "message":
      return line.text;
    default:
      return format(`${line.kind}: ${line.text}`, ["dim"]);
  }
}

function toUserFacingInput(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError || isUserFacingShape(error)) {
    return {
      code: error.code,
      title: cleanText(error.title) ?? DEFAULT_ERROR_TITLE,
      message: cleanText(error.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: cleanText(error.hint),
      next: cleanText(error.next),
      cause: error.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message:
      error === undefined || error === null
        ? DEFAULT_ERROR_MESSAGE
        : (cleanText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE),
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function isUserFacingShape(value: unknown): value is UserFacingErrorInput {
  if (!value || typeof value !== "object") return false;
  const record = value as Record<string, unknown>;
  return (
    isKnownCode(record.code) &&
    typeof record.title === "string" &&
    typeof record.message === "string"
  );
}

function isKnownCode(value: unknown): value is UserFacingErrorCode {
  return typeof value === "string" && KNOWN_CODES.has(value);
}

function cleanText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function describeCause(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  const text = cleanText(formatErrorMessage(cause));
  return text && text !== message ? text : undefined;
}

function firstStack(error: unknown, cause: unknown): string | undefined {
  if (error instanceof Error && error.stack) return error.stack;
  if (cause instanceof Error && cause.stack) return cause.stack;
  return undefined;
}
