import type { Span } from "./span.js";

/** Zero-based line and UTF-16 character, the way editors address text. */
export interface Position {
  line: number;
  character: number;
}

export interface TextRange {
  start: Position;
  end: Position;
}

function utf8Width(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * UTF-8 byte offsets for every string index of one source text.
 *
 * Spans count bytes; scanners and editors work on string indices. The second
 * half of a surrogate pair shares the byte offset that ends its code point.
 */
export class ByteOffsets {
  private readonly bytes: number[];

  constructor(readonly text: string) {
    const bytes = [0];
    let total = 0;
    for (let i = 0; i < text.length; i++) {
      const cp = text.codePointAt(i) ?? 0;
      total += utf8Width(cp);
      if (cp > 0xffff) {
        bytes.push(total);
        i++;
      }
      bytes.push(total);
    }
    this.bytes = bytes;
  }

  get byteLength(): number {
    return this.bytes[this.bytes.length - 1] ?? 0;
  }

  /** Byte offset of string index `index`, clamped to the text. */
  byteAt(index: number): number {
    const clamped = Math.max(0, Math.min(index, this.text.length));
    return this.bytes[clamped] ?? this.byteLength;
  }

  /** First string index at or past byte offset `byte`. */
  indexAt(byte: number): number {
    let lo = 0;
    let hi = this.text.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.bytes[mid] ?? 0) < byte) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  span(start: number, end: number): Span {
    return { start: this.byteAt(start), end: this.byteAt(end) };
  }
}

/** Line/character range of a byte span. Lines break on LF only, like the tokenizer. */
export function spanToRange(span: Span, text: string): TextRange {
  const offsets = new ByteOffsets(text);
  return {
    start: positionAt(text, offsets.indexAt(span.start)),
    end: positionAt(text, offsets.indexAt(span.end)),
  };
}

function positionAt(text: string, index: number): Position {
  const clamped = Math.max(0, Math.min(index, text.length));
  let line = 0;
  let lineStart = 0;
  for (let nl = text.indexOf("\n"); nl !== -1 && nl < clamped; nl = text.indexOf("\n", nl + 1)) {
    line++;
    lineStart = nl + 1;
  }
  return { line, character: clamped - lineStart };
}
