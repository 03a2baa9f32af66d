/*
Purpose: turn any thrown value into the lines the CLI prints on stderr.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(true)).
*/

import {
  USER_FACING_ERROR_CODES,
  toUserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(stream: { isTTY?: boolean } = process.stderr): boolean {
  return Boolean(stream.isTTY);
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });

  const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
  if (cause && cause !== normalized.message) {
    lines.push({ kind: "cause", text: cause });
  }

  const stack = resolveStack(normalized.cause) ?? resolveStack(error);
  if (stack) {
    lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map((line) => {
    switch (line.kind) {
      case "title":
        return format(`Error: ${line.text}`, ["bold", "red"]);
      case "hint":
        return format(`Hint: ${line.text}`, ["yellow"]);
      case "next":
        return `Next: ${line.text}`;
      case "code":
      case "cause":
      case "stack":
        return format(`${line.kind}: ${line.text}`, ["dim"]);
      default:
        return line.text;
    }
  });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  const userFacing = toUserFacingError(error);
  if (userFacing) {
    return {
      code: userFacing.code,
      title: userFacing.title.trim() || DEFAULT_ERROR_TITLE,
      message: userFacing.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: userFacing.hint?.trim() || undefined,
      next: userFacing.next?.trim() || undefined,
      cause: userFacing.cause,
    };
  }

  const message = error === null || error === undefined ? "" : formatErrorMessage(error).trim();
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message || DEFAULT_ERROR_MESSAGE,
  };
}

function resolveStack(value: unknown): string | undefined {
  return value instanceof Error && value.stack ? value.stack : undefined;
}
