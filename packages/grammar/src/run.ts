import type { TokenNode } from "@buildspan/syntax";

import type { TokenizedInstruction } from "./copy.js";
import { matchHeredocOpener, readHeredocBodies, type OpenerMatch } from "./heredoc.js";
import type { SourceText } from "./source-text.js";

const RUN_OPTION = { node: "run_option", name: "run_option_name", value: "run_option_value" } as const;

interface BodyScan {
  readonly node: TokenNode;
  /** Offset where the next instruction may begin. */
  readonly resume: number;
}

/**
 * RUN: `--name=value` options, then an exec-form list or a shell body. The
 * shell body may open heredocs, whose blocks follow the opener line.
 */
export function tokenizeRun(text: SourceText, start: number, keywordEnd: number): TokenizedInstruction {
  const children: TokenNode[] = [];
  let pos = keywordEnd;
  let resume: number | null = null;

  for (;;) {
    const bodyStart = text.skipInlineSpace(pos);
    const separated = text.skipSeparators(bodyStart, "comment");
    pos = separated.pos;
    if (text.atLineEnd(pos)) {
      children.push(...separated.comments);
      break;
    }

    if (text.source.startsWith("--", pos)) {
      children.push(...separated.comments);
      const end = text.wordEnd(pos);
      children.push(text.keyValueNode(RUN_OPTION, pos, end));
      pos = end;
      continue;
    }

    const exec = text.char(pos) === "[" ? scanExec(text, pos) : null;
    if (exec) {
      children.push(...separated.comments, exec.node);
      resume = exec.resume;
      break;
    }

    // Shell bodies own their leading comment lines, so rescan from the body start.
    const shell = scanShell(text, bodyStart);
    if (shell) {
      children.push(shell.node);
      resume = shell.resume;
    } else {
      pos = text.lineEnd(pos);
    }
    break;
  }

  const contentEnd = children.reduce((end, child) => Math.max(end, child.span.end), keywordEnd);
  const end = text.extendOverInlineSpace(contentEnd);
  return {
    node: text.node("run", start, end, children),
    end: resume ?? text.afterNewline(pos),
  };
}

function scanJsonString(text: SourceText, at: number): number | null {
  let i = at + 1;
  while (i < text.length) {
    const ch = text.char(i);
    if (ch === "\n") return null;
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === '"') return i + 1;
    i++;
  }
  return null;
}

function isJsonString(raw: string): boolean {
  try {
    return typeof JSON.parse(raw) === "string";
  } catch {
    return false;
  }
}

/**
 * `["a", "b"]` spread over continuations if need be. Returns null unless the
 * whole rest of the logical line is one well-formed list; the body is then
 * shell form.
 */
function scanExec(text: SourceText, at: number): BodyScan | null {
  const strings: TokenNode[] = [];
  const skip = (from: number): number => {
    const separated = text.skipSeparators(from, "comment");
    strings.push(...separated.comments);
    return separated.pos;
  };

  let i = skip(at + 1);
  if (text.char(i) !== "]") {
    for (;;) {
      if (text.char(i) !== '"') return null;
      const close = scanJsonString(text, i);
      if (close === null) return null;
      const element = text.node("string", i, close);
      if (!isJsonString(element.text)) return null;
      strings.push(element);
      i = skip(close);
      if (text.char(i) === ",") {
        i = skip(i + 1);
        continue;
      }
      if (text.char(i) === "]") break;
      return null;
    }
  }

  const end = i + 1;
  const after = text.skipSeparators(end, "comment").pos;
  if (!text.atLineEnd(after)) return null;
  return { node: text.node("run_exec", at, end, strings), resume: text.afterNewline(after) };
}

/**
 * Shell body from `bodyStart`: one literal per physical line (up to the
 * continuation escape), comment lines as their own fragments, and a heredoc
 * at the first `<<NAME` outside quotes. Null when there is no content at all.
 */
function scanShell(text: SourceText, bodyStart: number): BodyScan | null {
  const fragments: TokenNode[] = [];
  let fragmentStart = bodyStart;
  let i = bodyStart;
  let quote: '"' | "'" | null = null;

  const flush = (end: number): void => {
    if (end > fragmentStart) fragments.push(text.node("shell_literal", fragmentStart, end));
  };

  for (;;) {
    if (text.atLineEnd(i)) {
      flush(i);
      break;
    }

    const next = text.continuationAt(i);
    if (next !== null) {
      flush(i);
      const gap = text.skipGap(next, "shell_comment");
      fragments.push(...gap.comments);
      i = fragmentStart = gap.pos;
      continue;
    }

    const ch = text.char(i);
    if (quote === "'") {
      if (ch === "'") quote = null;
      i++;
      continue;
    }
    if (ch === "\\") {
      i = Math.min(i + (text.char(i + 1) === "\n" ? 1 : 2), text.length);
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      i++;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      i++;
      continue;
    }
    if (ch === "<") {
      const opener = matchHeredocOpener(text, i);
      if (opener) {
        flush(i);
        return withHeredoc(text, bodyStart, fragments, opener);
      }
    }
    i++;
  }

  const last = fragments[fragments.length - 1];
  if (!last) return null;
  const breakable = text.node("any_breakable", bodyStart, last.span.end, fragments);
  return {
    node: text.node("run_shell", bodyStart, last.span.end, [breakable]),
    resume: text.afterNewline(text.lineEnd(last.span.end)),
  };
}

/** `<<NAME` openers in `[from, to)` outside quotes. */
function scanOpeners(text: SourceText, from: number, to: number): OpenerMatch[] {
  const openers: OpenerMatch[] = [];
  let quote: '"' | "'" | null = null;
  for (let i = from; i < to; i++) {
    const ch = text.char(i);
    if (quote) {
      if (quote === '"' && ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === "\\") {
      i++;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "<") {
      const opener = matchHeredocOpener(text, i);
      if (opener) {
        openers.push(opener);
        i = opener.end - 1;
      }
    }
  }
  return openers;
}

/**
 * Heredoc part of a shell body. Every opener on the opener line becomes a
 * delimiter node and gets its block read, so none goes unnoticed; the text
 * between the first opener and the next one (or the line end) is the trailer.
 */
function withHeredoc(
  text: SourceText,
  bodyStart: number,
  fragments: TokenNode[],
  first: OpenerMatch,
): BodyScan {
  const lineEnd = text.lineEnd(first.end);
  const more = scanOpeners(text, first.end, lineEnd);
  const heredocChildren: TokenNode[] = [text.node("heredoc_delimiter", first.start, first.end)];

  const trailerStart = text.skipInlineSpace(first.end);
  let trailerEnd = more[0]?.start ?? lineEnd;
  while (trailerEnd > trailerStart && /\s/.test(text.char(trailerEnd - 1))) trailerEnd--;
  if (trailerEnd > trailerStart) {
    heredocChildren.push(text.node("heredoc_trailer", trailerStart, trailerEnd));
  }
  for (const opener of more) {
    heredocChildren.push(text.node("heredoc_delimiter", opener.start, opener.end));
  }

  const names = [first.name, ...more.map((o) => o.name)];
  const bodies = readHeredocBodies(text, text.afterNewline(lineEnd), names);
  heredocChildren.push(...bodies.nodes);
  const heredocEnd = bodies.nodes.length > 0 ? bodies.end : lineEnd;
  const heredoc = text.node("run_heredoc", first.start, heredocEnd, heredocChildren);

  const shellChildren = fragments.length > 0
    ? [text.node("any_breakable", bodyStart, first.start, fragments), heredoc]
    : [heredoc];
  const shellStart = fragments.length > 0 ? bodyStart : first.start;
  return {
    node: text.node("run_shell", shellStart, heredocEnd, shellChildren),
    resume: bodies.nodes.length > 0 ? bodies.end : text.afterNewline(lineEnd),
  };
}
