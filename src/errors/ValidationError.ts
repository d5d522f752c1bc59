import { EntityOverlayError, ErrorCode, type ErrorContext } from "./EntityOverlayError";

/**
 * Error for input the caller has to change before retrying.
 */
export class ValidationError extends EntityOverlayError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "ValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static emptyInput(message: string, field: string, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      message,
      ErrorCode.VALIDATION_EMPTY_INPUT,
      { ...context, field }
    );
  }

  static unsupportedFormat(fileName: string, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      "Invalid file format. Please upload a PDF or DOCX.",
      ErrorCode.VALIDATION_UNSUPPORTED_FORMAT,
      { ...context, field: "file", value: fileName, fileName }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }

  static payloadTooLarge(field: string, size: number, limit: number, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      `${field} is ${size} bytes, limit is ${limit} bytes`,
      ErrorCode.VALIDATION_PAYLOAD_TOO_LARGE,
      { ...context, field, value: size }
    );
  }
}
