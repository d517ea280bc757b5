import { BreakableString } from "../model/breakable-string.js";
import { genericParseError, unexpectedToken } from "../model/errors.js";
import type {
  Heredoc,
  RunInstruction,
  RunOption,
  ShellOrExecExpr,
  StringArray,
} from "../model/instructions.js";
import { emptySpanAt } from "../model/span.js";
import type { SpannedString } from "../model/spanned-string.js";
import type { TokenNode } from "../model/tokens.js";
import { debug } from "../shared/debug.js";
import { err, ok, type Result } from "../shared/result.js";

import { parseBreakable } from "./breakable.js";
import { parseString, parseStringArray } from "./decode.js";
import { HeredocMatcher } from "./heredoc-matcher.js";

export function parseRunOption(node: TokenNode): Result<RunOption> {
  if (node.kind !== "run_option") return err(unexpectedToken(node));
  let name: SpannedString | null = null;
  let value: SpannedString | null = null;

  for (const field of node.children) {
    switch (field.kind) {
      case "run_option_name":
        name = parseString(field);
        break;
      case "run_option_value":
        value = parseString(field);
        break;
      default:
        return err(unexpectedToken(field));
    }
  }

  if (!name) return err(genericParseError("run options require a key", node.span));
  if (!value) return err(genericParseError("run options require a value", node.span));
  return ok({ span: node.span, name, value, original: node.text });
}

/** Verbatim source form of an option, e.g. `--mount=type=cache,target=/root`. */
export function formatRunOption(option: RunOption): string {
  return option.original;
}

/** Resolve the single heredoc of a `run_heredoc` node. */
export function parseRunHeredoc(node: TokenNode): Result<Heredoc> {
  if (node.kind !== "run_heredoc") return err(unexpectedToken(node));
  const matcher = new HeredocMatcher("run");
  let opened = false;
  let heredoc: Heredoc | null = null;

  for (const child of node.children) {
    let step: Result<unknown>;
    switch (child.kind) {
      case "heredoc_delimiter":
        if (opened) return err(unexpectedToken(child));
        opened = true;
        step = matcher.open(child);
        break;
      case "heredoc_trailer":
        step = matcher.trail(child);
        break;
      case "heredoc_body":
        step = matcher.body(child);
        break;
      case "heredoc_terminator": {
        const closed = matcher.close(child);
        if (closed.ok) heredoc = closed.value;
        step = closed;
        break;
      }
      default:
        return err(unexpectedToken(child));
    }
    if (!step.ok) return step;
  }

  const finished = matcher.finish();
  if (!finished.ok) return finished;
  if (!heredoc) return err(genericParseError("missing heredoc delimiter", node.span));
  return ok(heredoc);
}

/**
 * Assemble a RUN instruction.
 *
 * Options come first; the first `run_exec` or `run_shell` child is the body and
 * anything after it is ignored by the walk.
 */
export function assembleRun(node: TokenNode): Result<RunInstruction> {
  if (node.kind !== "run") return err(unexpectedToken(node));

  const options: RunOption[] = [];
  let body: TokenNode | null = null;
  for (const field of node.children) {
    if (field.kind === "run_option") {
      const option = parseRunOption(field);
      if (!option.ok) return option;
      options.push(option.value);
      continue;
    }
    if (field.kind === "comment") continue;
    if (field.kind === "run_exec" || field.kind === "run_shell") {
      body = field;
      break;
    }
    return err(unexpectedToken(field));
  }

  if (!body) return err(genericParseError("missing run expression", node.span));

  const expr = body.kind === "run_exec" ? parseExec(body) : parseShell(body);
  if (!expr.ok) return expr;

  debug.run("assembled", { form: expr.value.$kind, options: options.length });
  return ok({ $kind: "run", span: node.span, options, expr: expr.value });
}

function parseExec(node: TokenNode): Result<ShellOrExecExpr> {
  const array = parseStringArray(node);
  if (!array.ok) return array;
  return ok({ $kind: "exec", array: array.value });
}

function parseShell(node: TokenNode): Result<ShellOrExecExpr> {
  const [first, second, extra] = node.children;
  if (!first) return err(genericParseError("missing run shell expression", node.span));

  if (first.kind === "run_heredoc") {
    if (second) return err(unexpectedToken(second));
    const heredoc = parseRunHeredoc(first);
    if (!heredoc.ok) return heredoc;
    // No command text before the heredoc: anchor an empty shell at its start.
    const shell = new BreakableString(emptySpanAt(heredoc.value.span.start));
    return ok({ $kind: "shell-with-heredoc", shell, heredoc: heredoc.value });
  }

  if (first.kind !== "any_breakable") return err(unexpectedToken(first));
  const shell = parseBreakable(first);
  if (!shell.ok) return shell;
  if (!second) return ok({ $kind: "shell", shell: shell.value });

  if (extra) return err(unexpectedToken(extra));
  const heredoc = parseRunHeredoc(second);
  if (!heredoc.ok) return heredoc;
  return ok({ $kind: "shell-with-heredoc", shell: shell.value, heredoc: heredoc.value });
}

/** Shell body of a RUN instruction, heredoc form included, or null for exec form. */
export function runShell(run: RunInstruction): BreakableString | null {
  return run.expr.$kind === "exec" ? null : run.expr.shell;
}

export function runExec(run: RunInstruction): StringArray | null {
  return run.expr.$kind === "exec" ? run.expr.array : null;
}
