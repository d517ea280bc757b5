/* =======================================================================================
 * INSTRUCTION RECORDS
 * ---------------------------------------------------------------------------------------
 * Immutable AST values produced by the assemblers. Variant unions are closed and
 * discriminated by `$kind`; callers are expected to match them exhaustively.
 * ======================================================================================= */

import type { BreakableString } from "./breakable-string.js";
import type { Span } from "./span.js";
import type { SpannedString } from "./spanned-string.js";

/** Inline literal block opened by `<<DELIM` and closed by a `DELIM` line. */
export interface Heredoc {
  /** From the opener's `<<` through the end of the terminator line. */
  readonly span: Span;
  readonly delimiter: SpannedString;
  /** Non-blank text after the delimiter on the opener line, e.g. `/file` in `tee <<EOF /file`. */
  readonly trailer: SpannedString | null;
  /** Raw block content; ends with a newline unless empty. */
  readonly body: SpannedString;
  /** The exact terminator line, newline included. */
  readonly terminator: SpannedString;
}

/** `--name=value` modifier of a COPY instruction. */
export interface CopyFlag {
  readonly span: Span;
  readonly name: SpannedString;
  readonly value: SpannedString;
}

export type SourceType =
  | { readonly $kind: "file-name"; readonly value: SpannedString }
  | { readonly $kind: "file-contents"; readonly value: SpannedString; readonly heredoc: Heredoc };

export interface CopyInstruction {
  readonly $kind: "copy";
  readonly span: Span;
  readonly flags: readonly CopyFlag[];
  /** Never empty. */
  readonly sources: readonly SourceType[];
  readonly destination: SpannedString;
}

/** `--name=value` option of a RUN instruction; `original` is its verbatim text. */
export interface RunOption {
  readonly span: Span;
  readonly name: SpannedString;
  readonly value: SpannedString;
  readonly original: string;
}

/** Bracketed list of quoted strings, as in `["echo", "hi"]`. */
export interface StringArray {
  readonly span: Span;
  readonly elements: readonly SpannedString[];
}

export type ShellOrExecExpr =
  | { readonly $kind: "exec"; readonly array: StringArray }
  | { readonly $kind: "shell"; readonly shell: BreakableString }
  | { readonly $kind: "shell-with-heredoc"; readonly shell: BreakableString; readonly heredoc: Heredoc };

export interface RunInstruction {
  readonly $kind: "run";
  readonly span: Span;
  readonly options: readonly RunOption[];
  readonly expr: ShellOrExecExpr;
}

export type Instruction = CopyInstruction | RunInstruction;

export type InstructionKind = Instruction["$kind"];

/** Family record for each instruction kind. */
export interface InstructionByKind {
  copy: CopyInstruction;
  run: RunInstruction;
}

/** Shape names used when reporting conversions. */
export const INSTRUCTION_SHAPES: Readonly<Record<InstructionKind, string>> = {
  copy: "CopyInstruction",
  run: "RunInstruction",
};
