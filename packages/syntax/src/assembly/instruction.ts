import { conversionError, unexpectedToken } from "../model/errors.js";
import {
  INSTRUCTION_SHAPES,
  type CopyInstruction,
  type Instruction,
  type InstructionByKind,
  type InstructionKind,
  type RunInstruction,
} from "../model/instructions.js";
import type { TokenNode } from "../model/tokens.js";
import { debug } from "../shared/debug.js";
import { err, ok, type Result } from "../shared/result.js";

import { assembleCopy } from "./copy.js";
import { assembleRun } from "./run.js";

/** Assemble whichever instruction family the root node is tagged with. */
export function assembleInstruction(node: TokenNode): Result<Instruction> {
  switch (node.kind) {
    case "copy":
      return assembleCopy(node);
    case "run":
      return assembleRun(node);
    default:
      return err(unexpectedToken(node));
  }
}

export function describeInstruction(instruction: Instruction): string {
  return INSTRUCTION_SHAPES[instruction.$kind];
}

/**
 * Narrow a generic instruction to one family's record. A value of that family
 * comes back unchanged; anything else is a ConversionError.
 */
export function narrowInstruction<K extends InstructionKind>(
  instruction: Instruction,
  kind: K,
): Result<InstructionByKind[K]> {
  if (isInstructionOf(instruction, kind)) return ok(instruction);
  const from = describeInstruction(instruction);
  const to = INSTRUCTION_SHAPES[kind];
  debug.convert("mismatch", { from, to });
  return err(conversionError(from, to));
}

function isInstructionOf<K extends InstructionKind>(
  instruction: Instruction,
  kind: K,
): instruction is InstructionByKind[K] {
  return instruction.$kind === kind;
}

export function toCopyInstruction(instruction: Instruction): Result<CopyInstruction> {
  return narrowInstruction(instruction, "copy");
}

export function toRunInstruction(instruction: Instruction): Result<RunInstruction> {
  return narrowInstruction(instruction, "run");
}
