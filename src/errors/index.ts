export {
  EntityOverlayError,
  ErrorCode,
  isEntityOverlayError,
  getErrorCode,
  httpStatusFor,
  type ErrorContext,
} from "./EntityOverlayError";

export { ValidationError } from "./ValidationError";
export { ExtractionError } from "./ExtractionError";
export { PipelineError } from "./PipelineError";
export { SpanOrderError } from "./SpanOrderError";
export { StorageError } from "./StorageError";
