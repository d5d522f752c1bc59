/**
 * Base error class for all entity-overlay errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Validation errors (4xxx)
  VALIDATION_EMPTY_INPUT = 4001,
  VALIDATION_UNSUPPORTED_FORMAT = 4002,
  VALIDATION_INVALID_FORMAT = 4004,
  VALIDATION_PAYLOAD_TOO_LARGE = 4005,

  // Extraction errors (5xxx)
  EXTRACTION_FAILED = 5001,

  // Pipeline errors (51xx)
  PIPELINE_FAILED = 5101,

  // Span contract errors (52xx)
  SPAN_PREREQ_VIOLATION = 5201,

  // Storage errors (6xxx)
  STORAGE_WRITE_FAILED = 6001,

  // General errors (9xxx)
  UNKNOWN = 9999,
}

export interface ErrorContext {
  operation: string;
  fileName?: string;
  filePath?: string;
  label?: string;
  correlationId?: string;
  timestamp?: string;
  [key: string]: unknown;
}

/**
 * Base error class. All project-specific errors extend it.
 */
export class EntityOverlayError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = "EntityOverlayError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.context = {
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
      ...context,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Message safe to return to the client.
   */
  toUserMessage(): string {
    return this.message;
  }

  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.fileName) parts.push(`File: ${this.context.fileName}`);
    if (this.context.filePath) parts.push(`Path: ${this.context.filePath}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

export function isEntityOverlayError(error: unknown): error is EntityOverlayError {
  return error instanceof EntityOverlayError;
}

/**
 * Get error code from any error type.
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (isEntityOverlayError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

/**
 * HTTP status for an error: user-correctable input problems are client errors,
 * everything else is internal.
 */
export function httpStatusFor(error: unknown): 400 | 500 {
  const code = getErrorCode(error);
  return code >= 4000 && code < 5000 ? 400 : 500;
}
