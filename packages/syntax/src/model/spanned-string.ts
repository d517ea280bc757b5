import type { Span } from "./span.js";

/**
 * A decoded value paired with the raw source extent it was decoded from.
 *
 * `content` has quotes and escapes resolved, so it may be shorter than the
 * text `span` covers.
 */
export interface SpannedString {
  readonly span: Span;
  readonly content: string;
}

export function spannedString(span: Span, content: string): SpannedString {
  return { span, content };
}
