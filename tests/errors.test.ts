import { describe, it, expect } from "vitest";
import {
  EntityOverlayError,
  ErrorCode,
  ExtractionError,
  PipelineError,
  SpanOrderError,
  StorageError,
  ValidationError,
  getErrorCode,
  httpStatusFor,
  isEntityOverlayError,
} from "../src/errors";

describe("EntityOverlayError", () => {
  it("carries code, context and timestamp", () => {
    const error = new EntityOverlayError("boom", ErrorCode.UNKNOWN, { operation: "test", fileName: "a.pdf" });
    expect(error.code).toBe(ErrorCode.UNKNOWN);
    expect(error.context.operation).toBe("test");
    expect(error.context.fileName).toBe("a.pdf");
    expect(error.context.timestamp).toBe(error.timestamp);
    expect(error).toBeInstanceOf(Error);
  });

  it("defaults the operation", () => {
    expect(new EntityOverlayError("boom").context.operation).toBe("unknown");
  });

  it("keeps the cause", () => {
    const cause = new Error("root");
    const error = new EntityOverlayError("boom", ErrorCode.UNKNOWN, { operation: "op" }, { cause });
    expect(error.cause).toBe(cause);
    expect(error.toUserMessage()).toBe("boom");
  });

  it("builds a log line", () => {
    const error = StorageError.writeFailed("/tmp/out.docx", new Error("EACCES"), { operation: "save" });
    expect(error.toLogMessage()).toBe(
      "[StorageError] | Code: 6001 | Op: save | Failed to write document: /tmp/out.docx | Path: /tmp/out.docx | Cause: EACCES"
    );
  });
});

describe("subclasses", () => {
  it("ValidationError factories", () => {
    const empty = ValidationError.emptyInput("No text provided", "text");
    expect(empty.code).toBe(ErrorCode.VALIDATION_EMPTY_INPUT);
    expect(empty.field).toBe("text");

    const unsupported = ValidationError.unsupportedFormat("report.txt");
    expect(unsupported.code).toBe(ErrorCode.VALIDATION_UNSUPPORTED_FORMAT);
    expect(unsupported.value).toBe("report.txt");
    expect(unsupported.context.fileName).toBe("report.txt");

    expect(ValidationError.invalidFormat("PORT", "a positive integer", "abc").message).toBe(
      "Invalid format for PORT: expected a positive integer"
    );
    expect(ValidationError.payloadTooLarge("file", 20, 10).code).toBe(ErrorCode.VALIDATION_PAYLOAD_TOO_LARGE);
  });

  it("ExtractionError, PipelineError, SpanOrderError", () => {
    const extraction = ExtractionError.failed("a.docx", "docx");
    expect(extraction.message).toBe("Failed to extract text from DOCX file a.docx");
    expect(extraction.format).toBe("docx");

    const pipeline = PipelineError.failed("compromise");
    expect(pipeline.pipeline).toBe("compromise");
    expect(pipeline.code).toBe(ErrorCode.PIPELINE_FAILED);

    const span = SpanOrderError.outOfBounds(2, 5, 50, 10);
    expect(span.spanIndex).toBe(2);
    expect(span.context.spanIndex).toBe(2);
    expect(span.name).toBe("SpanOrderError");
  });
});

describe("helpers", () => {
  it("classifies errors", () => {
    expect(isEntityOverlayError(PipelineError.failed("x"))).toBe(true);
    expect(isEntityOverlayError(new Error("x"))).toBe(false);
    expect(getErrorCode(new Error("x"))).toBe(ErrorCode.UNKNOWN);
    expect(getErrorCode(ExtractionError.failed("a.pdf", "pdf"))).toBe(ErrorCode.EXTRACTION_FAILED);
  });

  it("maps validation errors to 400 and the rest to 500", () => {
    expect(httpStatusFor(ValidationError.emptyInput("No text provided", "text"))).toBe(400);
    expect(httpStatusFor(ValidationError.unsupportedFormat("a.txt"))).toBe(400);
    expect(httpStatusFor(ExtractionError.failed("a.pdf", "pdf"))).toBe(500);
    expect(httpStatusFor(PipelineError.failed("x"))).toBe(500);
    expect(httpStatusFor(SpanOrderError.overlapping(1, 2, 3))).toBe(500);
    expect(httpStatusFor(new TypeError("x"))).toBe(500);
  });
});
