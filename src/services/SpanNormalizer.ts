/**
 * Label filtering and span-contract checks.
 *
 * Pure functions: inputs are never mutated, results are new arrays.
 */

import type { EntitySpan, LabelSet } from "./EntityOverlay.types";
import { SpanOrderError } from "../errors";

/**
 * Keep only spans whose label is selected. Stable: relative order is
 * preserved, nothing is merged, split or re-sorted.
 */
export function normalizeSpans<T extends EntitySpan>(
  entities: readonly T[],
  selected: LabelSet | Iterable<string>
): T[] {
  const labels: LabelSet = selected instanceof Set ? selected : new Set(selected);
  if (labels.size === 0) return [];
  return entities.filter((entity) => labels.has(entity.label));
}

/**
 * Throw SpanOrderError unless every span lies within the text, is non-empty,
 * and starts at or after the end of the previous span.
 */
export function assertSpanOrder(text: string, spans: readonly EntitySpan[]): void {
  let previousEnd = 0;
  for (let i = 0; i < spans.length; i++) {
    const { startChar, endChar } = spans[i];
    if (
      !Number.isInteger(startChar) ||
      !Number.isInteger(endChar) ||
      startChar < 0 ||
      startChar >= endChar ||
      endChar > text.length
    ) {
      throw SpanOrderError.outOfBounds(i, startChar, endChar, text.length);
    }
    if (startChar < previousEnd) {
      throw SpanOrderError.overlapping(i, startChar, previousEnd);
    }
    previousEnd = endChar;
  }
}
