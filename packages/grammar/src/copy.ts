import { coverSpans, emptySpanAt, type TokenNode } from "@buildspan/syntax";

import { matchHeredocOpener, readHeredocBodies } from "./heredoc.js";
import type { SourceText } from "./source-text.js";

export interface TokenizedInstruction {
  readonly node: TokenNode;
  /** Where the next instruction may begin: a string index while scanning, a byte offset once returned. */
  readonly end: number;
}

const COPY_FLAG = { node: "copy_flag", name: "copy_flag_name", value: "copy_flag_value" } as const;

/**
 * COPY: flags, then paths and `<<NAME` openers on one logical line. Any opener
 * switches the form to `copy_heredoc` and pulls the blocks below the line in.
 */
export function tokenizeCopy(text: SourceText, start: number, keywordEnd: number): TokenizedInstruction {
  const children: TokenNode[] = [];
  const openers: string[] = [];
  let sawOperand = false;
  let pos = keywordEnd;

  for (;;) {
    const separated = text.skipSeparators(pos, "comment");
    children.push(...separated.comments);
    pos = separated.pos;
    if (text.atLineEnd(pos)) break;

    const opener = matchHeredocOpener(text, pos);
    if (opener && text.isWordBoundary(opener.end)) {
      children.push(text.node("heredoc_delimiter", opener.start, opener.end));
      openers.push(opener.name);
      sawOperand = true;
      pos = opener.end;
      continue;
    }

    const end = text.wordEnd(pos);
    if (!sawOperand && text.source.startsWith("--", pos)) {
      children.push(text.keyValueNode(COPY_FLAG, pos, end));
    } else {
      sawOperand = true;
      children.push(text.node("copy_pathspec", pos, end));
    }
    pos = end;
  }

  let resume = text.afterNewline(pos);
  if (openers.length > 0) {
    const bodies = readHeredocBodies(text, resume, openers);
    children.push(...bodies.nodes);
    resume = bodies.end;
  }

  const formSpan = coverSpans(children.map((c) => c.span)) ?? emptySpanAt(keywordEnd);
  const form = text.node(openers.length > 0 ? "copy_heredoc" : "copy_standard", formSpan.start, formSpan.end, children);
  const end = text.extendOverInlineSpace(Math.max(keywordEnd, formSpan.end));
  return { node: text.node("copy", start, end, [form]), end: resume };
}
