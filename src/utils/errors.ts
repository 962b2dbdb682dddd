/**
 * Standard error classes for shapecast
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  DECODE_ERROR = "DECODE_ERROR",
  SCHEMA_CONFLICT = "SCHEMA_CONFLICT",
  INPUT_LIMIT_EXCEEDED = "INPUT_LIMIT_EXCEEDED",
}

export type ErrorDetails = Record<string, unknown>;

export class ShapecastError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ShapecastError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends ShapecastError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends ShapecastError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * A non-blank input line is not valid JSON
 */
export class DecodeError extends ShapecastError {
  constructor(
    public readonly line: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.DECODE_ERROR, message, { line }, options);
    this.name = "DecodeError";
  }
}

/**
 * Two observations at the same slot carry incompatible kinds and the
 * conflict policy is "error"
 */
export class SchemaConflictError extends ShapecastError {
  constructor(
    public readonly path: string,
    public readonly kinds: readonly [string, string],
  ) {
    super(
      ErrorCode.SCHEMA_CONFLICT,
      `Conflicting kinds at ${path}: ${kinds[0]} and ${kinds[1]}`,
      { path, kinds: [...kinds] },
    );
    this.name = "SchemaConflictError";
  }
}

export class InputLimitError extends ShapecastError {
  constructor(public readonly maxLines: number) {
    super(
      ErrorCode.INPUT_LIMIT_EXCEEDED,
      `Input exceeds the limit of ${maxLines} lines`,
      { maxLines },
    );
    this.name = "InputLimitError";
  }
}

/**
 * Wrap anything thrown into a ShapecastError, keeping the original as cause
 */
export function toShapecastError(error: unknown): ShapecastError {
  if (error instanceof ShapecastError) {
    return error;
  }
  return new ShapecastError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
