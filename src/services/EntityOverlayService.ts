/**
 * EntityOverlayService: per-request orchestration of recognition, overlay,
 * rendering, export and statistics.
 *
 * Holds only immutable, process-wide collaborators (the pipeline, the sink,
 * the extractor). Every call builds its own intermediate values.
 */

import type { RecognitionPipeline } from "../pipeline/RecognitionPipeline";
import type { PipelineOutput, StatsReport } from "./EntityOverlay.types";
import type { DocumentSink } from "./FileDocumentSink";
import { overlay } from "./OverlaySegmenter";
import { renderHtml } from "./HtmlHighlightRenderer";
import { exportDocument } from "./DocxExporter";
import { analyzeEntities } from "./AnalyticsAggregator";
import { TextExtractor, type ExtractedUpload } from "./TextExtractor";
import { colorMap } from "../config/labelStyles";
import { EXPORT_DEFAULTS } from "../config/constants";
import { PipelineError, ValidationError } from "../errors";
import { createLogger, type LoggerLike } from "../utils/logger";

export interface EntityOverlayServiceDeps {
  pipeline: RecognitionPipeline;
  sink: DocumentSink;
  textExtractor?: TextExtractor;
  outputFileName?: string;
  logger?: LoggerLike;
}

export interface LabelStyle {
  label: string;
  color: string;
}

export interface FilterResult {
  html: string;
}

export interface SaveResult {
  success: true;
  filePath: string;
}

export class EntityOverlayService {
  /** Pipeline labels, read once at construction. */
  readonly knownLabels: readonly string[];

  private readonly pipeline: RecognitionPipeline;
  private readonly sink: DocumentSink;
  private readonly textExtractor: TextExtractor;
  private readonly outputFileName: string;
  private readonly log: LoggerLike;

  constructor(deps: EntityOverlayServiceDeps) {
    this.pipeline = deps.pipeline;
    this.sink = deps.sink;
    this.textExtractor = deps.textExtractor ?? new TextExtractor();
    this.outputFileName = deps.outputFileName ?? EXPORT_DEFAULTS.FILE_NAME;
    this.log = deps.logger ?? createLogger({ component: "EntityOverlayService" });
    this.knownLabels = Object.freeze([...deps.pipeline.labels()].sort());
  }

  get pipelineName(): string {
    return this.pipeline.name;
  }

  labelCatalog(): LabelStyle[] {
    return Object.entries(colorMap(this.knownLabels, "screen")).map(([label, color]) => ({ label, color }));
  }

  async filter(text: string, selected: Iterable<string>): Promise<FilterResult> {
    const source = text.trim();
    if (source === "") {
      return { html: renderHtml([]) };
    }

    const output = await this.recognize(source, "filter");
    const segments = overlay(source, output.entities, selected);
    this.log.debug("Rendered highlight", { operation: "filter", segments: segments.length });
    return { html: renderHtml(segments) };
  }

  async save(text: string, selected: Iterable<string>): Promise<SaveResult> {
    const source = text.trim();
    if (source === "") {
      throw ValidationError.emptyInput("No content to save", "text", { operation: "save" });
    }

    const output = await this.recognize(source, "save");
    const segments = overlay(source, output.entities, selected);
    const result = await exportDocument(segments, this.sink, this.outputFileName);
    this.log.info("Exported document", {
      operation: "save",
      filePath: result.filePath,
      runs: result.runCount,
      bytes: result.byteLength,
    });
    return { success: true, filePath: result.filePath };
  }

  async stats(text: string): Promise<StatsReport> {
    const source = text.trim();
    if (source === "") {
      throw ValidationError.emptyInput("No text provided", "text", { operation: "stats" });
    }

    const output = await this.recognize(source, "stats");
    return analyzeEntities(output);
  }

  async upload(fileName: string, bytes: Uint8Array): Promise<ExtractedUpload> {
    return this.textExtractor.extract(fileName, bytes);
  }

  private async recognize(text: string, operation: string): Promise<PipelineOutput> {
    const startedAt = Date.now();
    let output: PipelineOutput;
    try {
      output = await this.pipeline.process(text);
    } catch (error) {
      this.log.error("Recognition pipeline failed", { operation, pipeline: this.pipeline.name }, error);
      if (error instanceof PipelineError) throw error;
      throw PipelineError.failed(this.pipeline.name, error instanceof Error ? error : undefined, { operation });
    }

    this.log.debug("Recognized entities", {
      operation,
      chars: text.length,
      entities: output.entities.length,
      tokens: output.tokens.length,
      durationMs: Date.now() - startedAt,
    });
    return output;
  }
}
