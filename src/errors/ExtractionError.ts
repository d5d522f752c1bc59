import { EntityOverlayError, ErrorCode, type ErrorContext } from "./EntityOverlayError";

/**
 * Error for malformed PDF/DOCX input that the extractor could not read.
 */
export class ExtractionError extends EntityOverlayError {
  public readonly format?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    context: Partial<ErrorContext> & { format?: string } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "ExtractionError";
    this.format = context.format;
  }

  static failed(fileName: string, format: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ExtractionError(
      `Failed to extract text from ${format.toUpperCase()} file ${fileName}`,
      ErrorCode.EXTRACTION_FAILED,
      { ...context, fileName, format },
      { cause }
    );
  }
}
