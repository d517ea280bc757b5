import { debug, emptySpanAt, err, genericParseError, ok, type Result } from "@buildspan/syntax";

import { tokenizeCopy, type TokenizedInstruction } from "./copy.js";
import { resolveTokenizerOptions, type TokenizerOptions } from "./options.js";
import { tokenizeRun } from "./run.js";
import { SourceText } from "./source-text.js";

export type { TokenizedInstruction } from "./copy.js";

const KEYWORD = /[A-Za-z]+/y;

/**
 * Recognize the single instruction at byte offset `options.offset` and
 * materialize its token tree. Blank lines and whole-line comments before it are
 * skipped; keywords are case-insensitive. Spans and `end` are UTF-8 byte
 * offsets.
 */
export function tokenizeInstruction(source: string, options?: TokenizerOptions): Result<TokenizedInstruction> {
  const { offset, escape } = resolveTokenizerOptions(options);
  const text = new SourceText(source, escape);
  const { offsets } = text;
  const start = text.skipBlankAndCommentLines(offsets.indexAt(offset));
  if (start >= source.length) {
    return err(genericParseError("expected an instruction", emptySpanAt(offsets.byteAt(start))));
  }

  KEYWORD.lastIndex = start;
  const keyword = KEYWORD.exec(source);
  if (!keyword) {
    return err(genericParseError("expected an instruction keyword", offsets.span(start, text.lineEnd(start))));
  }

  const keywordEnd = start + keyword[0].length;
  let tokenized: TokenizedInstruction;
  switch (keyword[0].toLowerCase()) {
    case "copy":
      tokenized = tokenizeCopy(text, start, keywordEnd);
      break;
    case "run":
      tokenized = tokenizeRun(text, start, keywordEnd);
      break;
    default:
      return err(genericParseError(`unsupported instruction: ${keyword[0]}`, offsets.span(start, keywordEnd)));
  }

  const node = text.toByteSpans(tokenized.node);
  debug.tokenize("instruction", {
    keyword: keyword[0],
    span: node.span,
    children: node.children.map((c) => c.kind),
  });
  return ok({ node, end: offsets.byteAt(tokenized.end) });
}
