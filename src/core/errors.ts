/*
Purpose: error types raised while planning job inputs and rendering shell variables.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new FilesystemError("..."); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class JobInputsError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "JobInputsError";
  }
}

export class ConfigError extends JobInputsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class InvalidFilenameError extends JobInputsError {
  constructor(
    public readonly filename: string,
    cause?: unknown,
  ) {
    super(`Invalid filename ${JSON.stringify(filename)}`, cause);
    this.name = "InvalidFilenameError";
  }
}

export class FilesystemError extends JobInputsError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "FilesystemError";
  }
}

export class MissingInputFileError extends JobInputsError {
  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`Unable to load job input from ${path}`, cause);
    this.name = "MissingInputFileError";
  }
}

export class InvalidInputError extends JobInputsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidInputError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  filename: "FILENAME_ERROR",
  filesystem: "FILESYSTEM_ERROR",
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

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: error.message,
      hint: "Set HOME (or pass --home) and check the JOB_INPUTS_* variables.",
      cause: error,
    });
  }

  if (error instanceof MissingInputFileError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Job input missing.",
      message: error.message,
      hint: "Make sure job_input.json exists and holds valid JSON, or pass --input.",
      cause: error,
    });
  }

  if (error instanceof InvalidInputError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Job input invalid.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof InvalidFilenameError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.filename,
      title: "File name cannot be used on disk.",
      message: error.message,
      hint: "Rename the platform file; \".\" and \"..\" are reserved.",
      cause: error,
    });
  }

  if (error instanceof FilesystemError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.filesystem,
      title: "Input directory layout blocked.",
      message: error.message,
      next: `Remove ${error.path} and retry.`,
      cause: error,
    });
  }

  return null;
}
