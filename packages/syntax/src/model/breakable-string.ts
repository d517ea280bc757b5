import { spanEquals, type Span } from "./span.js";

export type FragmentKind = "literal" | "comment";

/** One chunk of a breakable expression with the span it was captured from. */
export interface Fragment {
  readonly $kind: FragmentKind;
  readonly span: Span;
  readonly content: string;
}

/**
 * A shell-form body that may be split over several physical lines.
 *
 * Fragments are kept in source order so every piece can be mapped back to the
 * file. The command itself is {@link BreakableString.effectiveText}: literal
 * fragments only, concatenated verbatim.
 */
export class BreakableString {
  readonly span: Span;
  readonly components: readonly Fragment[];

  constructor(span: Span, components: readonly Fragment[] = []) {
    this.span = span;
    this.components = Object.freeze([...components]);
  }

  addLiteral(span: Span, content: string): BreakableString {
    return this.with({ $kind: "literal", span, content });
  }

  addComment(span: Span, content: string): BreakableString {
    return this.with({ $kind: "comment", span, content });
  }

  effectiveText(): string {
    let text = "";
    for (const fragment of this.components) {
      if (fragment.$kind === "literal") text += fragment.content;
    }
    return text;
  }

  literals(): Fragment[] {
    return this.components.filter((f) => f.$kind === "literal");
  }

  comments(): Fragment[] {
    return this.components.filter((f) => f.$kind === "comment");
  }

  isEmpty(): boolean {
    return this.components.length === 0;
  }

  equals(other: BreakableString): boolean {
    if (!spanEquals(this.span, other.span)) return false;
    if (this.components.length !== other.components.length) return false;
    return this.components.every((fragment, i) => {
      const theirs = other.components[i];
      return theirs !== undefined
        && theirs.$kind === fragment.$kind
        && theirs.content === fragment.content
        && spanEquals(theirs.span, fragment.span);
    });
  }

  toString(): string {
    return this.effectiveText();
  }

  private with(fragment: Fragment): BreakableString {
    return new BreakableString(this.span, [...this.components, fragment]);
  }
}
