/* =======================================================================================
 * TOKEN TREE (consumed interface)
 * ---------------------------------------------------------------------------------------
 * The tokenizer materializes one instruction as a tree of these nodes before any
 * assembly starts. Assemblers only read it.
 * ======================================================================================= */

import type { Span } from "./span.js";

/** Grammar construct a token node stands for. */
export type RuleKind =
  // instruction wrappers
  | "copy"
  | "run"
  // copy family
  | "copy_standard"
  | "copy_heredoc"
  | "copy_flag"
  | "copy_flag_name"
  | "copy_flag_value"
  | "copy_pathspec"
  // heredocs (shared)
  | "heredoc_delimiter"
  | "heredoc_trailer"
  | "heredoc_body"
  | "heredoc_terminator"
  // run family
  | "run_option"
  | "run_option_name"
  | "run_option_value"
  | "run_exec"
  | "string"
  | "run_shell"
  | "any_breakable"
  | "shell_literal"
  | "shell_comment"
  | "run_heredoc"
  // ignorable
  | "comment";

export interface TokenNode {
  readonly kind: RuleKind;
  readonly span: Span;
  /** Raw source text covered by `span`. */
  readonly text: string;
  readonly children: readonly TokenNode[];
}
