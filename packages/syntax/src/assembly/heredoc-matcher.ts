import {
  genericParseError,
  heredocTerminatorMismatch,
  unexpectedToken,
  unmatchedHeredocDelimiter,
  unmatchedHeredocTerminator,
} from "../model/errors.js";
import type { Heredoc } from "../model/instructions.js";
import { emptySpanAt, spanFromBounds } from "../model/span.js";
import { spannedString, type SpannedString } from "../model/spanned-string.js";
import type { RuleKind, TokenNode } from "../model/tokens.js";
import { debug } from "../shared/debug.js";
import { err, ok, type Result } from "../shared/result.js";

import { decodeQuoted } from "./decode.js";

interface PendingOpener {
  readonly node: TokenNode;
  readonly delimiter: SpannedString;
  trailer: SpannedString | null;
}

/**
 * Decode an opener such as `<<EOF`, `<<   EOF` or `<<"EOF"` to its identifier.
 * The span stays on the whole raw opener.
 */
export function decodeHeredocDelimiter(node: TokenNode): Result<SpannedString> {
  if (node.kind !== "heredoc_delimiter") return err(unexpectedToken(node));
  if (!node.text.startsWith("<<")) {
    return err(genericParseError(`heredoc delimiter must start with '<<': ${node.text}`, node.span));
  }
  const name = decodeQuoted(node.text.slice(2).trim());
  if (!name) {
    return err(genericParseError("heredoc delimiter requires a name", node.span));
  }
  return ok(spannedString(node.span, name));
}

/**
 * Pairs heredoc openers with terminator lines inside one instruction.
 *
 * Openers queue up in source order and each terminator closes the OLDEST open
 * one, so `<<A <<B` needs the `A` block first. Body nodes attach to the opener
 * the next terminator closes.
 */
export class HeredocMatcher {
  private readonly queue: PendingOpener[] = [];
  private pendingBody: TokenNode | null = null;

  constructor(private readonly instruction: RuleKind) {}

  /** Openers still waiting for a terminator. */
  get pending(): number {
    return this.queue.length;
  }

  open(node: TokenNode): Result<SpannedString> {
    const delimiter = decodeHeredocDelimiter(node);
    if (!delimiter.ok) return delimiter;
    this.queue.push({ node, delimiter: delimiter.value, trailer: null });
    debug.heredoc("open", { delimiter: delimiter.value.content, pending: this.queue.length });
    return delimiter;
  }

  /** Attach opener-line text that follows the most recent delimiter. */
  trail(node: TokenNode): Result<SpannedString> {
    const last = this.queue[this.queue.length - 1];
    if (node.kind !== "heredoc_trailer" || !last || last.trailer) return err(unexpectedToken(node));
    const trailer = spannedString(node.span, node.text);
    last.trailer = trailer;
    return ok(trailer);
  }

  body(node: TokenNode): Result<void> {
    if (node.kind !== "heredoc_body" || this.queue.length === 0 || this.pendingBody) {
      return err(unexpectedToken(node));
    }
    this.pendingBody = node;
    return ok(undefined);
  }

  close(node: TokenNode): Result<Heredoc> {
    if (node.kind !== "heredoc_terminator") return err(unexpectedToken(node));
    const opener = this.queue.shift();
    if (!opener) {
      debug.heredoc("unmatched-terminator", { terminator: node.text, span: node.span });
      return err(unmatchedHeredocTerminator(node));
    }

    const expected = `${opener.delimiter.content}\n`;
    if (node.text !== expected) {
      debug.heredoc("mismatch", { expected, found: node.text, span: node.span });
      return err(heredocTerminatorMismatch(this.instruction, expected, node));
    }

    const bodyNode = this.pendingBody;
    this.pendingBody = null;
    const body: SpannedString = bodyNode
      ? spannedString(bodyNode.span, bodyNode.text)
      : spannedString(emptySpanAt(node.span.start), "");

    debug.heredoc("close", { delimiter: opener.delimiter.content, pending: this.queue.length });
    return ok({
      span: spanFromBounds(opener.node.span.start, node.span.end),
      delimiter: opener.delimiter,
      trailer: opener.trailer,
      body,
      terminator: spannedString(node.span, node.text),
    });
  }

  /** Fails when any opener was never closed. */
  finish(): Result<void> {
    const first = this.queue[0];
    if (!first) return ok(undefined);
    const names = this.queue.map((p) => p.delimiter.content);
    debug.heredoc("unmatched-delimiters", { delimiters: names });
    return err(unmatchedHeredocDelimiter(names, first.node.span));
  }
}
