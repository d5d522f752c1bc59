import { EntityOverlayError, ErrorCode, type ErrorContext } from "./EntityOverlayError";

/**
 * Error for failures inside the recognition pipeline. Fatal to the request.
 */
export class PipelineError extends EntityOverlayError {
  public readonly pipeline?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PIPELINE_FAILED,
    context: Partial<ErrorContext> & { pipeline?: string } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "PipelineError";
    this.pipeline = context.pipeline;
  }

  static failed(pipeline: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new PipelineError(
      `Recognition pipeline ${pipeline} failed`,
      ErrorCode.PIPELINE_FAILED,
      { ...context, pipeline },
      { cause }
    );
  }

  static malformedOutput(pipeline: string, detail: string, context: Partial<ErrorContext> = {}) {
    return new PipelineError(
      `Recognition pipeline ${pipeline} returned malformed output: ${detail}`,
      ErrorCode.PIPELINE_FAILED,
      { ...context, pipeline }
    );
  }
}
