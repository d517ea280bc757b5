import { genericParseError, unexpectedToken } from "../model/errors.js";
import type { StringArray } from "../model/instructions.js";
import { spannedString, type SpannedString } from "../model/spanned-string.js";
import type { TokenNode } from "../model/tokens.js";
import { err, ok, type Result } from "../shared/result.js";

/**
 * Decode a possibly quoted word.
 *
 * Double quotes resolve backslash escapes (`\"` → `"`, `\\` → `\`); single
 * quotes are taken literally; bare words are returned unchanged.
 */
export function decodeQuoted(raw: string): string {
  if (raw.length >= 2) {
    const first = raw[0];
    const last = raw[raw.length - 1];
    if (first === '"' && last === '"') return unescapeDoubleQuoted(raw.slice(1, -1));
    if (first === "'" && last === "'") return raw.slice(1, -1);
  }
  return raw;
}

function unescapeDoubleQuoted(inner: string): string {
  let out = "";
  for (let i = 0; i < inner.length; i++) {
    const ch = inner.charAt(i);
    if (ch === "\\" && i + 1 < inner.length) {
      out += inner.charAt(i + 1);
      i++;
      continue;
    }
    out += ch;
  }
  return out;
}

/** Spanned, decoded value of a word-like node (path, flag part, option part). */
export function parseString(node: TokenNode): SpannedString {
  return spannedString(node.span, decodeQuoted(node.text));
}

/** Decode one JSON string literal of an exec-form list. */
export function parseJsonString(node: TokenNode): Result<SpannedString> {
  if (node.kind !== "string") return err(unexpectedToken(node));
  let decoded: unknown;
  try {
    decoded = JSON.parse(node.text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(genericParseError(`invalid string literal ${node.text}: ${reason}`, node.span));
  }
  if (typeof decoded !== "string") {
    return err(genericParseError(`expected a string literal but found ${node.text}`, node.span));
  }
  return ok(spannedString(node.span, decoded));
}

export function parseStringArray(node: TokenNode): Result<StringArray> {
  const elements: SpannedString[] = [];
  for (const child of node.children) {
    if (child.kind === "comment") continue;
    const element = parseJsonString(child);
    if (!element.ok) return element;
    elements.push(element.value);
  }
  return ok({ span: node.span, elements });
}
