/**
 * OverlaySegmenter: turns text plus ordered entity spans into a gap-filled
 * segment list for rendering and export.
 *
 * The concatenated segment texts always equal the source text, and no
 * segment is empty.
 */

import type { EntitySpan, LabelSet, Segment } from "./EntityOverlay.types";
import { assertSpanOrder, normalizeSpans } from "./SpanNormalizer";

export function segmentText(text: string, spans: readonly EntitySpan[]): Segment[] {
  assertSpanOrder(text, spans);

  const segments: Segment[] = [];
  let cursor = 0;

  for (const span of spans) {
    if (span.startChar > cursor) {
      segments.push({ text: text.slice(cursor, span.startChar), label: null });
    }
    segments.push({ text: text.slice(span.startChar, span.endChar), label: span.label });
    cursor = span.endChar;
  }

  if (cursor < text.length) {
    segments.push({ text: text.slice(cursor), label: null });
  }

  return segments;
}

/**
 * Filter to the selected labels, then segment.
 */
export function overlay(
  text: string,
  entities: readonly EntitySpan[],
  selected: LabelSet | Iterable<string>
): Segment[] {
  return segmentText(text, normalizeSpans(entities, selected));
}

/** Inverse of segmentation, used to check the partition. */
export function joinSegments(segments: readonly Segment[]): string {
  return segments.map((segment) => segment.text).join("");
}
