import type { PipelineOutput } from "../services/EntityOverlay.types";

/**
 * Named-entity recognition backend.
 *
 * `process` must return entities sorted by `startChar` and mutually
 * non-overlapping, with offsets into the exact string it was given.
 * Implementations are shared by all requests and hold no per-request state.
 */
export interface RecognitionPipeline {
  readonly name: string;
  /** Every label this pipeline can emit. */
  labels(): readonly string[];
  process(text: string): Promise<PipelineOutput>;
}
