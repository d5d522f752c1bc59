// Engine
export { normalizeSpans, assertSpanOrder } from "./services/SpanNormalizer";
export { segmentText, overlay, joinSegments } from "./services/OverlaySegmenter";
export { renderHtml } from "./services/HtmlHighlightRenderer";
export {
  toStyledRuns,
  buildDocument,
  packDocument,
  exportDocument,
  type ExportResult,
} from "./services/DocxExporter";
export { analyzeEntities, toStatsPayload } from "./services/AnalyticsAggregator";
export {
  colorFor,
  colorMap,
  SCREEN_FALLBACK_COLOR,
  EXPORT_FALLBACK_COLOR,
  type ColorSpace,
} from "./config/labelStyles";

export type {
  EntitySpan,
  RecognizedEntity,
  Token,
  SentenceSpan,
  PipelineOutput,
  LabelSet,
  Segment,
  StatsReport,
  StatsPayload,
  StyledRun,
} from "./services/EntityOverlay.types";

// Collaborators
export type { RecognitionPipeline } from "./pipeline/RecognitionPipeline";
export { CompromisePipeline, resolveOverlaps } from "./pipeline/CompromisePipeline";
export { FileDocumentSink, type DocumentSink } from "./services/FileDocumentSink";
export { PdfExtractor, type PdfExtractionResult } from "./services/PdfExtractor";
export { DocxExtractor, type DocxExtractionResult } from "./services/DocxExtractor";
export {
  TextExtractor,
  detectUploadFormat,
  type UploadFormat,
  type ExtractedUpload,
  type BinaryTextExtractor,
} from "./services/TextExtractor";

// Service and HTTP surface
export {
  EntityOverlayService,
  type EntityOverlayServiceDeps,
  type LabelStyle,
  type FilterResult,
  type SaveResult,
} from "./services/EntityOverlayService";
export { createApp, type AppDeps } from "./app";
export { loadServerSettings, DEFAULT_SERVER_SETTINGS, type ServerSettings } from "./config/ServerSettings";

// Error types
export {
  EntityOverlayError,
  ValidationError,
  ExtractionError,
  PipelineError,
  SpanOrderError,
  StorageError,
  ErrorCode,
  isEntityOverlayError,
  getErrorCode,
  httpStatusFor,
  type ErrorContext,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry, type LoggerLike } from "./utils/logger";
