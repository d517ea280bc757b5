import { decodeQuoted, type TokenNode } from "@buildspan/syntax";

import type { SourceText } from "./source-text.js";

const DELIMITER_NAME = /"[^"\n]+"|'[^'\n]+'|[A-Za-z0-9_][A-Za-z0-9_.-]*/y;

export interface OpenerMatch {
  readonly start: number;
  readonly end: number;
  /** Decoded identifier the terminator line has to repeat. */
  readonly name: string;
}

/**
 * Recognize `<<NAME` (spaces after `<<` allowed, name optionally quoted) at
 * `at`. Any `<` run longer than two, such as a `<<<` here-string, is not one.
 */
export function matchHeredocOpener(text: SourceText, at: number): OpenerMatch | null {
  const { source } = text;
  if (!source.startsWith("<<", at) || text.char(at + 2) === "<" || text.char(at - 1) === "<") return null;
  let i = at + 2;
  while (text.char(i) === " " || text.char(i) === "\t") i++;
  DELIMITER_NAME.lastIndex = i;
  const match = DELIMITER_NAME.exec(source);
  if (!match) return null;
  return { start: at, end: i + match[0].length, name: decodeQuoted(match[0]) };
}

interface LineRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Line that closes the heredoc `name`: the first whose text is exactly the
 * name. Without one, the final line stands in so the assembler reports the
 * mismatch; lines like `eof` or `  EOF` stay body text.
 */
function findTerminatorLine(text: SourceText, from: number, name: string): LineRange {
  let lineStart = from;
  let lastStart = from;
  while (lineStart < text.length) {
    const lineEnd = text.lineEnd(lineStart);
    if (text.source.slice(lineStart, lineEnd) === name) {
      return { start: lineStart, end: text.afterNewline(lineEnd) };
    }
    lastStart = lineStart;
    lineStart = text.afterNewline(lineEnd);
    if (lineStart === lineEnd) break;
  }
  return { start: lastStart, end: text.length };
}

export interface HeredocBodies {
  /** `heredoc_body` / `heredoc_terminator` pairs in opener order. */
  readonly nodes: TokenNode[];
  readonly end: number;
}

/**
 * Read the blocks for `names` one after another starting at the line at
 * `from`. Openers left without any lines get no nodes at all.
 */
export function readHeredocBodies(text: SourceText, from: number, names: readonly string[]): HeredocBodies {
  const nodes: TokenNode[] = [];
  let pos = from;
  for (const name of names) {
    if (pos >= text.length) break;
    const terminator = findTerminatorLine(text, pos, name);
    nodes.push(text.node("heredoc_body", pos, terminator.start));
    nodes.push(text.node("heredoc_terminator", terminator.start, terminator.end));
    pos = terminator.end;
  }
  return { nodes, end: pos };
}
