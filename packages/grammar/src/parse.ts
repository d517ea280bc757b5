import { assembleInstruction, type Instruction, type Result } from "@buildspan/syntax";

import type { TokenizerOptions } from "./options.js";
import { tokenizeInstruction } from "./tokenize.js";

/** Tokenize and assemble the instruction at `options.offset` in one step. */
export function parseInstruction(source: string, options?: TokenizerOptions): Result<Instruction> {
  const tokenized = tokenizeInstruction(source, options);
  if (!tokenized.ok) return tokenized;
  return assembleInstruction(tokenized.value.node);
}
