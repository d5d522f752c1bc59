import { describe, it, expect } from "vitest";
import { normalizeSpans, assertSpanOrder } from "../src/services/SpanNormalizer";
import { SpanOrderError, ErrorCode } from "../src/errors";
import type { EntitySpan } from "../src/services/EntityOverlay.types";

const ENTITIES: EntitySpan[] = [
  { startChar: 0, endChar: 3, label: "ORG" },
  { startChar: 4, endChar: 8, label: "PERSON" },
  { startChar: 9, endChar: 12, label: "ORG" },
  { startChar: 13, endChar: 15, label: "PLACE" },
];

describe("normalizeSpans", () => {
  it("keeps only selected labels in original order", () => {
    const result = normalizeSpans(ENTITIES, new Set(["ORG", "PLACE"]));
    expect(result.map((e) => e.startChar)).toEqual([0, 9, 13]);
  });

  it("accepts any iterable of labels", () => {
    expect(normalizeSpans(ENTITIES, ["PERSON"])).toEqual([ENTITIES[1]]);
  });

  it("returns nothing for an empty selection", () => {
    expect(normalizeSpans(ENTITIES, new Set())).toEqual([]);
  });

  it("ignores labels absent from the document", () => {
    expect(normalizeSpans(ENTITIES, ["EVENT"])).toEqual([]);
    expect(normalizeSpans(ENTITIES, ["EVENT", "PERSON"])).toEqual([ENTITIES[1]]);
  });

  it("returns a new array and leaves the input untouched", () => {
    const input = [...ENTITIES];
    const result = normalizeSpans(input, ["ORG", "PERSON", "PLACE"]);
    expect(result).not.toBe(input);
    expect(result).toEqual(ENTITIES);
    expect(input).toEqual(ENTITIES);
  });

  it("does not re-sort out-of-order input", () => {
    const reversed = [...ENTITIES].reverse();
    expect(normalizeSpans(reversed, ["ORG"]).map((e) => e.startChar)).toEqual([9, 0]);
  });
});

describe("assertSpanOrder", () => {
  const text = "abcdefghijklmnop";

  it("accepts sorted, adjacent and boundary-touching spans", () => {
    expect(() =>
      assertSpanOrder(text, [
        { startChar: 0, endChar: 3, label: "A" },
        { startChar: 3, endChar: 6, label: "B" },
        { startChar: 10, endChar: 16, label: "C" },
      ])
    ).not.toThrow();
    expect(() => assertSpanOrder("", [])).not.toThrow();
  });

  it("rejects overlapping spans", () => {
    let caught: unknown;
    try {
      assertSpanOrder(text, [
        { startChar: 0, endChar: 5, label: "A" },
        { startChar: 4, endChar: 8, label: "B" },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SpanOrderError);
    if (!(caught instanceof SpanOrderError)) return;
    expect(caught.code).toBe(ErrorCode.SPAN_PREREQ_VIOLATION);
    expect(caught.spanIndex).toBe(1);
    expect(caught.message).toBe("Span 1 starts at 4 before previous span ends at 5");
  });

  it("rejects unsorted spans", () => {
    expect(() =>
      assertSpanOrder(text, [
        { startChar: 8, endChar: 10, label: "A" },
        { startChar: 0, endChar: 2, label: "B" },
      ])
    ).toThrow(SpanOrderError);
  });

  it("rejects empty, negative and out-of-range spans", () => {
    expect(() => assertSpanOrder(text, [{ startChar: 3, endChar: 3, label: "A" }])).toThrow(
      "Span 0 [3, 3) is outside text of length 16"
    );
    expect(() => assertSpanOrder(text, [{ startChar: -1, endChar: 2, label: "A" }])).toThrow(SpanOrderError);
    expect(() => assertSpanOrder(text, [{ startChar: 10, endChar: 17, label: "A" }])).toThrow(SpanOrderError);
    expect(() => assertSpanOrder(text, [{ startChar: 1.5, endChar: 4, label: "A" }])).toThrow(SpanOrderError);
  });
});
