// Grammar package public API
//
// Turns COPY / RUN source text into the token trees @buildspan/syntax assembles.

export {
  DEFAULT_TOKENIZER_OPTIONS,
  ESCAPE_CHARACTERS,
  resolveTokenizerOptions,
  type EscapeCharacter,
  type ResolvedTokenizerOptions,
  type TokenizerOptions,
} from "./options.js";
export { SourceText, isInlineSpace, type GapResult } from "./source-text.js";
export { matchHeredocOpener, readHeredocBodies, type HeredocBodies, type OpenerMatch } from "./heredoc.js";
export { tokenizeCopy } from "./copy.js";
export { tokenizeRun } from "./run.js";
export { tokenizeInstruction, type TokenizedInstruction } from "./tokenize.js";
export { parseInstruction } from "./parse.js";
