/** Characters the language accepts as its line-continuation escape. */
export const ESCAPE_CHARACTERS = ["\\", "`"] as const;

export type EscapeCharacter = (typeof ESCAPE_CHARACTERS)[number];

export interface TokenizerOptions {
  /** UTF-8 byte offset where the instruction (or the blank/comment lines before it) begins. */
  offset?: number;
  /** Continuation escape; the backtick form matches an `# escape=`` ` directive. */
  escape?: EscapeCharacter;
}

export interface ResolvedTokenizerOptions {
  offset: number;
  escape: EscapeCharacter;
}

export const DEFAULT_TOKENIZER_OPTIONS: Readonly<ResolvedTokenizerOptions> = {
  offset: 0,
  escape: "\\",
};

export function resolveTokenizerOptions(options: TokenizerOptions = {}): ResolvedTokenizerOptions {
  return {
    offset: Math.max(0, options.offset ?? DEFAULT_TOKENIZER_OPTIONS.offset),
    escape: options.escape ?? DEFAULT_TOKENIZER_OPTIONS.escape,
  };
}
