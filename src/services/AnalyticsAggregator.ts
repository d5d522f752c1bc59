/**
 * Descriptive statistics over a pipeline result.
 *
 * Works on the unfiltered entity list; the label filter used for display has
 * no effect here. Every ratio is zero-guarded.
 */

import type { PipelineOutput, StatsPayload, StatsReport } from "./EntityOverlay.types";

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function analyzeEntities(output: Readonly<PipelineOutput>): StatsReport {
  const { entities, tokens, sentences } = output;

  const counts = new Map<string, number>();
  for (const entity of entities) {
    counts.set(entity.label, (counts.get(entity.label) ?? 0) + 1);
  }

  const entityCount = entities.length;
  const tokenCount = tokens.length;
  const sentenceLengths = sentences.map((sentence) => sentence.tokenEnd - sentence.tokenStart);

  return {
    entityCount,
    entityDistribution: Object.fromEntries(counts),
    tokenCount,
    entityDensity: tokenCount > 0 ? entityCount / tokenCount : 0,
    sentenceLengths,
    avgSentenceLength: mean(sentenceLengths),
    namedEntityLengthDistribution: entities.map((entity) => entity.tokenEnd - entity.tokenStart),
  };
}

export function toStatsPayload(report: StatsReport): StatsPayload {
  return {
    entity_count: report.entityCount,
    entity_distribution: report.entityDistribution,
    token_count: report.tokenCount,
    entity_density: report.entityDensity,
    sentence_lengths: report.sentenceLengths,
    avg_sentence_length: report.avgSentenceLength,
    named_entity_length_distribution: report.namedEntityLengthDistribution,
  };
}
