/* =======================================================================================
 * PARSE ERROR TAXONOMY (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Closed set of assembly failures. Errors are plain data returned through
 * Result; nothing in the core throws them.
 * ======================================================================================= */

import type { Span } from "./span.js";
import type { RuleKind, TokenNode } from "./tokens.js";

interface ParseErrorBase<K extends string> {
  readonly $kind: K;
  readonly message: string;
  readonly span: Span | null;
}

/** Shape violation: missing key/value, body or destination, too few sources. */
export type GenericParseError = ParseErrorBase<"GenericParseError">;

export interface UnexpectedToken extends ParseErrorBase<"UnexpectedToken"> {
  readonly span: Span;
  readonly rule: RuleKind;
  readonly text: string;
}

export interface HeredocTerminatorMismatch extends ParseErrorBase<"HeredocTerminatorMismatch"> {
  readonly span: Span;
  /** Instruction family the heredoc belongs to. */
  readonly instruction: RuleKind;
  readonly expected: string;
  readonly found: string;
}

export interface UnmatchedHeredocTerminator extends ParseErrorBase<"UnmatchedHeredocTerminator"> {
  readonly span: Span;
  readonly terminator: string;
}

export interface UnmatchedHeredocDelimiter extends ParseErrorBase<"UnmatchedHeredocDelimiter"> {
  readonly span: Span;
  readonly delimiters: readonly string[];
}

export interface ConversionError extends ParseErrorBase<"ConversionError"> {
  readonly from: string;
  readonly to: string;
}

export type ParseError =
  | GenericParseError
  | UnexpectedToken
  | HeredocTerminatorMismatch
  | UnmatchedHeredocTerminator
  | UnmatchedHeredocDelimiter
  | ConversionError;

export type ParseErrorKind = ParseError["$kind"];

export function genericParseError(message: string, span: Span | null = null): GenericParseError {
  return { $kind: "GenericParseError", message, span };
}

export function unexpectedToken(node: TokenNode): UnexpectedToken {
  return {
    $kind: "UnexpectedToken",
    message: `unexpected token '${node.kind}' at ${node.span.start}..${node.span.end}`,
    span: node.span,
    rule: node.kind,
    text: node.text,
  };
}

export function heredocTerminatorMismatch(
  instruction: RuleKind,
  expected: string,
  terminator: TokenNode,
): HeredocTerminatorMismatch {
  return {
    $kind: "HeredocTerminatorMismatch",
    message: `invalid heredoc in ${instruction} instruction: expected terminator ${JSON.stringify(expected)} but found ${JSON.stringify(terminator.text)}`,
    span: terminator.span,
    instruction,
    expected,
    found: terminator.text,
  };
}

export function unmatchedHeredocTerminator(terminator: TokenNode): UnmatchedHeredocTerminator {
  return {
    $kind: "UnmatchedHeredocTerminator",
    message: `heredoc terminator ${JSON.stringify(terminator.text)} has no matching delimiter`,
    span: terminator.span,
    terminator: terminator.text,
  };
}

export function unmatchedHeredocDelimiter(delimiters: readonly string[], span: Span): UnmatchedHeredocDelimiter {
  return {
    $kind: "UnmatchedHeredocDelimiter",
    message: `unmatched heredoc delimiters: ${delimiters.join(", ")}`,
    span,
    delimiters,
  };
}

export function conversionError(from: string, to: string): ConversionError {
  return {
    $kind: "ConversionError",
    message: `cannot convert ${from} to ${to}`,
    span: null,
    from,
    to,
  };
}
