import { describe, test, expect } from "vitest";

import {
  coverSpans,
  emptySpanAt,
  normalizeSpanMaybe,
  spanContains,
  spanEquals,
  spanFromBounds,
} from "../../src/model/span.js";

describe("span utilities", () => {
  test("spanFromBounds and normalizeSpanMaybe order the bounds", () => {
    expect(spanFromBounds(3, 1)).toEqual({ start: 1, end: 3 });
    expect(normalizeSpanMaybe({ start: 9, end: 2 })).toEqual({ start: 2, end: 9 });
    expect(normalizeSpanMaybe(undefined)).toBeNull();
    expect(emptySpanAt(7)).toEqual({ start: 7, end: 7 });
  });

  test("coverSpans merges and skips nulls", () => {
    expect(coverSpans([{ start: 10, end: 12 }, null, { start: 2, end: 5 }])).toEqual({ start: 2, end: 12 });
    expect(coverSpans([])).toBeNull();
  });

  test("containment includes touching bounds", () => {
    const outer = { start: 0, end: 12 };
    expect(spanContains(outer, { start: 0, end: 12 })).toBe(true);
    expect(spanContains(outer, { start: 5, end: 13 })).toBe(false);
    expect(spanContains(outer, emptySpanAt(12))).toBe(true);
  });

  test("spanEquals treats missing spans as equal only to each other", () => {
    expect(spanEquals({ start: 1, end: 2 }, { start: 1, end: 2 })).toBe(true);
    expect(spanEquals({ start: 1, end: 2 }, null)).toBe(false);
    expect(spanEquals(null, null)).toBe(true);
  });
});
