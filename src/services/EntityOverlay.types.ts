/**
 * Shared shapes for recognition output, overlay segments and statistics.
 * Everything here lives for one request and is never cached.
 */

/** Character-offset entity span; `endChar` is exclusive. */
export interface EntitySpan {
  startChar: number;
  endChar: number;
  label: string;
}

/** Entity as delivered by a recognition pipeline. */
export interface RecognizedEntity extends EntitySpan {
  text: string;
  tokenStart: number;   // index of first token
  tokenEnd: number;     // exclusive
}

export interface Token {
  text: string;
  startChar: number;
  endChar: number;
}

/** Sentence as a span over the document's token list. */
export interface SentenceSpan {
  tokenStart: number;
  tokenEnd: number;     // exclusive
}

export interface PipelineOutput {
  entities: RecognizedEntity[];
  tokens: Token[];
  sentences: SentenceSpan[];
}

export type LabelSet = ReadonlySet<string>;

/** Contiguous, non-empty run of text; `label === null` means plain text. */
export interface Segment {
  text: string;
  label: string | null;
}

export interface StatsReport {
  entityCount: number;
  entityDistribution: Record<string, number>;
  tokenCount: number;
  entityDensity: number;
  sentenceLengths: number[];
  avgSentenceLength: number;
  namedEntityLengthDistribution: number[];
}

/** Wire shape of a StatsReport. */
export interface StatsPayload {
  entity_count: number;
  entity_distribution: Record<string, number>;
  token_count: number;
  entity_density: number;
  sentence_lengths: number[];
  avg_sentence_length: number;
  named_entity_length_distribution: number[];
}

/** One unit of exported document content. */
export interface StyledRun {
  text: string;
  bold?: boolean;
  color?: string;
  label?: string;
}
