/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Editor-facing envelope for parse errors. Builder functions live in
 * shared/diagnostics.ts.
 * ======================================================================================= */

import type { Span } from "./span.js";
import type { TextRange } from "./text.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Layer that produced the diagnostic. */
export type DiagnosticStage = "tokenize" | "assemble";

export type SyntaxDiagnosticCode =
  | "BS1001"
  | "BS1002"
  | "BS1101"
  | "BS1102"
  | "BS1103"
  | "BS1201";

export interface SyntaxDiagnostic<
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: SyntaxDiagnosticCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  span: Span | null;
  /** Line/character form of `span`, when the source text was available. */
  range: TextRange | null;
  data?: Readonly<TData>;
}
