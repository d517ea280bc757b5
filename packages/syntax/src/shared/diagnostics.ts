import type { ParseError } from "../model/errors.js";
import { normalizeSpanMaybe } from "../model/span.js";
import { spanToRange } from "../model/text.js";

// Re-export foundation types from model
export type {
  DiagnosticSeverity,
  DiagnosticStage,
  SyntaxDiagnostic,
  SyntaxDiagnosticCode,
} from "../model/diagnostics.js";

import type { DiagnosticStage, SyntaxDiagnostic, SyntaxDiagnosticCode } from "../model/diagnostics.js";

export interface ToDiagnosticOptions {
  /** Source text the error's span points into; enables `range`. */
  source?: string;
  stage?: DiagnosticStage;
}

export function diagnosticCode(error: ParseError): SyntaxDiagnosticCode {
  switch (error.$kind) {
    case "GenericParseError":
      return "BS1001";
    case "UnexpectedToken":
      return "BS1002";
    case "HeredocTerminatorMismatch":
      return "BS1101";
    case "UnmatchedHeredocTerminator":
      return "BS1102";
    case "UnmatchedHeredocDelimiter":
      return "BS1103";
    case "ConversionError":
      return "BS1201";
  }
}

/** Convert a parse error into the diagnostic envelope editors and linters consume. */
export function toDiagnostic(error: ParseError, options: ToDiagnosticOptions = {}): SyntaxDiagnostic {
  const span = normalizeSpanMaybe(error.span);
  const range = span && options.source !== undefined ? spanToRange(span, options.source) : null;
  const data = diagnosticData(error);
  return {
    code: diagnosticCode(error),
    message: error.message,
    stage: options.stage ?? "assemble",
    severity: "error",
    span,
    range,
    ...(data ? { data } : {}),
  };
}

function diagnosticData(error: ParseError): Record<string, unknown> | null {
  switch (error.$kind) {
    case "UnexpectedToken":
      return { rule: error.rule };
    case "HeredocTerminatorMismatch":
      return { instruction: error.instruction, expected: error.expected, found: error.found };
    case "UnmatchedHeredocTerminator":
      return { terminator: error.terminator };
    case "UnmatchedHeredocDelimiter":
      return { delimiters: [...error.delimiters] };
    case "ConversionError":
      return { from: error.from, to: error.to };
    case "GenericParseError":
      return null;
  }
}
