import { EntityOverlayError, ErrorCode, type ErrorContext } from "./EntityOverlayError";

/**
 * Error for persisting exported documents.
 */
export class StorageError extends EntityOverlayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_WRITE_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "StorageError";
  }

  static writeFailed(filePath: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new StorageError(
      `Failed to write document: ${filePath}`,
      ErrorCode.STORAGE_WRITE_FAILED,
      { ...context, filePath },
      { cause }
    );
  }
}
