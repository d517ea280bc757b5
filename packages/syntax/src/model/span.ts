/**
 * Half-open range `[start, end)` of UTF-8 byte offsets into the source text.
 *
 * Spans never embed the text itself. `ByteOffsets` in text.ts maps them to
 * string indices.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export function spanFromBounds(start: number, end: number): Span {
  return start <= end ? { start, end } : { start: end, end: start };
}

/** Zero-width span at `offset`. */
export function emptySpanAt(offset: number): Span {
  return { start: offset, end: offset };
}

export function normalizeSpanMaybe(span: Span | null | undefined): Span | null {
  return span ? spanFromBounds(span.start, span.end) : null;
}

export function spanEquals(a: Span | null | undefined, b: Span | null | undefined): boolean {
  if (!a || !b) return a === b;
  return a.start === b.start && a.end === b.end;
}

/** True when `inner` lies fully inside `outer` (touching bounds included). */
export function spanContains(outer: Span, inner: Span): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

/** Smallest span covering every non-null input, or null when there is none. */
export function coverSpans(spans: Iterable<Span | null | undefined>): Span | null {
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const span of spans) {
    if (!span) continue;
    if (span.start < start) start = span.start;
    if (span.end > end) end = span.end;
  }
  return start === Number.POSITIVE_INFINITY ? null : { start, end };
}
