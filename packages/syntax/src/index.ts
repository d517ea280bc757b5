// Syntax package public API
//
// Span-preserving instruction records and the assemblers that build them from
// a tokenizer's token tree. Import from here rather than deep paths.

// === Model ===
export {
  spanFromBounds,
  emptySpanAt,
  normalizeSpanMaybe,
  spanEquals,
  spanContains,
  coverSpans,
  type Span,
} from "./model/span.js";
export { spannedString, type SpannedString } from "./model/spanned-string.js";
export { BreakableString, type Fragment, type FragmentKind } from "./model/breakable-string.js";
export type { RuleKind, TokenNode } from "./model/tokens.js";
export {
  INSTRUCTION_SHAPES,
  type CopyFlag,
  type CopyInstruction,
  type Heredoc,
  type Instruction,
  type InstructionByKind,
  type InstructionKind,
  type RunInstruction,
  type RunOption,
  type ShellOrExecExpr,
  type SourceType,
  type StringArray,
} from "./model/instructions.js";
export { ByteOffsets, spanToRange, type Position, type TextRange } from "./model/text.js";

// === Errors ===
export {
  conversionError,
  genericParseError,
  heredocTerminatorMismatch,
  unexpectedToken,
  unmatchedHeredocDelimiter,
  unmatchedHeredocTerminator,
  type ConversionError,
  type GenericParseError,
  type HeredocTerminatorMismatch,
  type ParseError,
  type ParseErrorKind,
  type UnexpectedToken,
  type UnmatchedHeredocDelimiter,
  type UnmatchedHeredocTerminator,
} from "./model/errors.js";
export { collectResults, err, ok, type Result } from "./shared/result.js";
export {
  diagnosticCode,
  toDiagnostic,
  type DiagnosticSeverity,
  type DiagnosticStage,
  type SyntaxDiagnostic,
  type SyntaxDiagnosticCode,
  type ToDiagnosticOptions,
} from "./shared/diagnostics.js";

// === Debug ===
export {
  DEBUG_ENV_VAR,
  configureDebug,
  debug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./shared/debug.js";

// === Assembly ===
export { decodeQuoted, parseJsonString, parseString, parseStringArray } from "./assembly/decode.js";
export { HeredocMatcher, decodeHeredocDelimiter } from "./assembly/heredoc-matcher.js";
export { parseBreakable } from "./assembly/breakable.js";
export { assembleCopy, parseCopyFlag } from "./assembly/copy.js";
export { assembleRun, formatRunOption, parseRunHeredoc, parseRunOption, runExec, runShell } from "./assembly/run.js";
export {
  assembleInstruction,
  describeInstruction,
  narrowInstruction,
  toCopyInstruction,
  toRunInstruction,
} from "./assembly/instruction.js";
