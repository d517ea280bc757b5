import { ByteOffsets, type RuleKind, type TokenNode } from "@buildspan/syntax";

import type { EscapeCharacter } from "./options.js";

export interface GapResult {
  /** Start of the first line that carries content again. */
  readonly pos: number;
  readonly comments: TokenNode[];
}

export function isInlineSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\r";
}

/**
 * Position-based helpers over one source string. Every method takes and
 * returns string indices, so callers can look ahead and back off freely;
 * {@link SourceText.toByteSpans} rebases a finished tree to byte offsets.
 */
export class SourceText {
  readonly offsets: ByteOffsets;

  constructor(
    readonly source: string,
    readonly escape: EscapeCharacter,
  ) {
    this.offsets = new ByteOffsets(source);
  }

  get length(): number {
    return this.source.length;
  }

  char(at: number): string {
    return this.source.charAt(at);
  }

  node(kind: RuleKind, start: number, end: number, children: readonly TokenNode[] = []): TokenNode {
    return { kind, span: { start, end }, text: this.source.slice(start, end), children };
  }

  atLineEnd(at: number): boolean {
    return at >= this.source.length || this.source.charAt(at) === "\n";
  }

  /** Offset of the newline ending the line that contains `at`, or the text length. */
  lineEnd(at: number): number {
    const nl = this.source.indexOf("\n", at);
    return nl === -1 ? this.source.length : nl;
  }

  /** Offset just past the newline at `at`, or `at` itself at end of text. */
  afterNewline(at: number): number {
    return at < this.source.length && this.source.charAt(at) === "\n" ? at + 1 : at;
  }

  skipInlineSpace(at: number): number {
    let i = at;
    while (i < this.source.length && isInlineSpace(this.source.charAt(i))) i++;
    return i;
  }

  /**
   * When the escape at `at` continues the line (only spaces may follow it
   * before the newline), the offset after that newline; otherwise null.
   */
  continuationAt(at: number): number | null {
    if (this.source.charAt(at) !== this.escape) return null;
    const i = this.skipInlineSpace(at + 1);
    if (i >= this.source.length) return i;
    return this.source.charAt(i) === "\n" ? i + 1 : null;
  }

  /**
   * Lines following a continuation: blank ones are dropped, whole-line
   * comments become `commentKind` nodes and keep the instruction going.
   */
  skipGap(at: number, commentKind: RuleKind): GapResult {
    const comments: TokenNode[] = [];
    let pos = at;
    while (pos < this.source.length) {
      const first = this.skipInlineSpace(pos);
      const end = this.lineEnd(first);
      if (first === end) {
        pos = this.afterNewline(end);
        continue;
      }
      if (this.source.charAt(first) !== "#") break;
      comments.push(this.node(commentKind, first, end));
      pos = this.afterNewline(end);
    }
    return { pos, comments };
  }

  /** Inline space and continuations up to the next item or the end of the logical line. */
  skipSeparators(at: number, commentKind: RuleKind): GapResult {
    const comments: TokenNode[] = [];
    let pos = this.skipInlineSpace(at);
    let next = this.continuationAt(pos);
    while (next !== null) {
      const gap = this.skipGap(next, commentKind);
      comments.push(...gap.comments);
      pos = this.skipInlineSpace(gap.pos);
      next = this.continuationAt(pos);
    }
    return { pos, comments };
  }

  /** Blank lines and whole-line comments between instructions. */
  skipBlankAndCommentLines(at: number): number {
    let pos = at;
    while (pos < this.source.length) {
      const first = this.skipInlineSpace(pos);
      const end = this.lineEnd(first);
      if (first !== end && this.source.charAt(first) !== "#") return first;
      pos = this.afterNewline(end);
    }
    return pos;
  }

  /**
   * End of the whitespace-delimited word at `at`. Quoted sections may hold
   * spaces; a continuation escape ends the word.
   */
  wordEnd(at: number): number {
    let i = at;
    let quote: string | null = null;
    while (i < this.source.length) {
      const ch = this.source.charAt(i);
      if (ch === "\n") break;
      if (quote) {
        if (quote === '"' && ch === "\\" && this.source.charAt(i + 1) !== "\n") {
          i += 2;
          continue;
        }
        if (ch === quote) quote = null;
        i++;
        continue;
      }
      if (isInlineSpace(ch) || this.continuationAt(i) !== null) break;
      if (ch === '"' || ch === "'") quote = ch;
      i++;
    }
    return Math.min(i, this.source.length);
  }

  isWordBoundary(at: number): boolean {
    return this.atLineEnd(at) || isInlineSpace(this.source.charAt(at)) || this.continuationAt(at) !== null;
  }

  /**
   * Grow an instruction's end over trailing spaces on its last line. Ends that
   * already sit after a newline (heredoc terminators) stay put.
   */
  extendOverInlineSpace(end: number): number {
    if (end > 0 && this.source.charAt(end - 1) === "\n") return end;
    return this.skipInlineSpace(end);
  }

  /** `--name=value` word as a flag/option node with name and value children. */
  keyValueNode(
    kinds: { readonly node: RuleKind; readonly name: RuleKind; readonly value: RuleKind },
    start: number,
    end: number,
  ): TokenNode {
    const nameStart = start + 2;
    const eq = this.source.indexOf("=", nameStart);
    const nameEnd = eq === -1 || eq > end ? end : eq;
    const children: TokenNode[] = [];
    if (nameEnd > nameStart) children.push(this.node(kinds.name, nameStart, nameEnd));
    if (nameEnd < end && end > nameEnd + 1) children.push(this.node(kinds.value, nameEnd + 1, end));
    return this.node(kinds.node, start, end, children);
  }

  toByteSpans(node: TokenNode): TokenNode {
    return {
      ...node,
      span: this.offsets.span(node.span.start, node.span.end),
      children: node.children.map((child) => this.toByteSpans(child)),
    };
  }
}
