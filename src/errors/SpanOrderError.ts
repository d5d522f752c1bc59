import { EntityOverlayError, ErrorCode, type ErrorContext } from "./EntityOverlayError";

/**
 * Entity spans that break the sorted, non-overlapping, in-bounds contract.
 */
export class SpanOrderError extends EntityOverlayError {
  public readonly spanIndex: number;

  constructor(
    message: string,
    spanIndex: number,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, ErrorCode.SPAN_PREREQ_VIOLATION, { ...context, spanIndex });
    this.name = "SpanOrderError";
    this.spanIndex = spanIndex;
  }

  static outOfBounds(spanIndex: number, startChar: number, endChar: number, textLength: number) {
    return new SpanOrderError(
      `Span ${spanIndex} [${startChar}, ${endChar}) is outside text of length ${textLength}`,
      spanIndex,
      { operation: "assertSpanOrder" }
    );
  }

  static overlapping(spanIndex: number, startChar: number, previousEnd: number) {
    return new SpanOrderError(
      `Span ${spanIndex} starts at ${startChar} before previous span ends at ${previousEnd}`,
      spanIndex,
      { operation: "assertSpanOrder" }
    );
  }
}
