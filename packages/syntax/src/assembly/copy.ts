import { genericParseError, unexpectedToken } from "../model/errors.js";
import type { CopyFlag, CopyInstruction, Heredoc, SourceType } from "../model/instructions.js";
import type { SpannedString } from "../model/spanned-string.js";
import type { TokenNode } from "../model/tokens.js";
import { debug } from "../shared/debug.js";
import { err, ok, type Result } from "../shared/result.js";

import { parseString } from "./decode.js";
import { HeredocMatcher } from "./heredoc-matcher.js";

const ARITY_MESSAGE = "copy requires at least one source and a destination";

export function parseCopyFlag(node: TokenNode): Result<CopyFlag> {
  if (node.kind !== "copy_flag") return err(unexpectedToken(node));
  let name: SpannedString | null = null;
  let value: SpannedString | null = null;

  for (const field of node.children) {
    switch (field.kind) {
      case "copy_flag_name":
        name = parseString(field);
        break;
      case "copy_flag_value":
        value = parseString(field);
        break;
      default:
        return err(unexpectedToken(field));
    }
  }

  if (!name) return err(genericParseError("copy flags require a key", node.span));
  if (!value) return err(genericParseError("copy flags require a value", node.span));
  return ok({ span: node.span, name, value });
}

/**
 * Assemble a COPY instruction.
 *
 * The node holds exactly one form child: `copy_standard` (a path list whose last
 * entry is the destination) or `copy_heredoc` (inline content blocks plus a
 * destination path).
 */
export function assembleCopy(node: TokenNode): Result<CopyInstruction> {
  if (node.kind !== "copy") return err(unexpectedToken(node));

  const [form, extra] = node.children;
  if (!form) return err(genericParseError("copy instruction expected a field", node.span));
  if (extra) return err(unexpectedToken(extra));

  const result = form.kind === "copy_standard"
    ? assembleStandard(node, form)
    : form.kind === "copy_heredoc"
      ? assembleHeredoc(node, form)
      : err(unexpectedToken(form));

  if (result.ok) {
    debug.copy("assembled", {
      form: form.kind,
      sources: result.value.sources.length,
      destination: result.value.destination.content,
    });
  }
  return result;
}

function assembleStandard(node: TokenNode, form: TokenNode): Result<CopyInstruction> {
  const flags: CopyFlag[] = [];
  const paths: SpannedString[] = [];

  for (const child of form.children) {
    switch (child.kind) {
      case "copy_flag": {
        const flag = parseCopyFlag(child);
        if (!flag.ok) return flag;
        flags.push(flag.value);
        break;
      }
      case "copy_pathspec":
        paths.push(parseString(child));
        break;
      case "comment":
        continue;
      default:
        return err(unexpectedToken(child));
    }
  }

  const destination = paths.pop();
  if (!destination || paths.length === 0) return err(genericParseError(ARITY_MESSAGE, node.span));

  return ok({
    $kind: "copy",
    span: node.span,
    flags,
    sources: paths.map((value): SourceType => ({ $kind: "file-name", value })),
    destination,
  });
}

/** Source positions in line order; heredoc slots are filled as terminators resolve. */
type Slot =
  | { $kind: "path"; value: SpannedString }
  | { $kind: "heredoc"; heredoc: Heredoc | null };

function assembleHeredoc(node: TokenNode, form: TokenNode): Result<CopyInstruction> {
  const flags: CopyFlag[] = [];
  const slots: Slot[] = [];
  const openSlots: Array<Extract<Slot, { $kind: "heredoc" }>> = [];
  const matcher = new HeredocMatcher("copy");
  let resolved = 0;

  for (const child of form.children) {
    switch (child.kind) {
      case "copy_flag": {
        const flag = parseCopyFlag(child);
        if (!flag.ok) return flag;
        flags.push(flag.value);
        break;
      }
      case "heredoc_delimiter": {
        const opened = matcher.open(child);
        if (!opened.ok) return opened;
        const slot: Extract<Slot, { $kind: "heredoc" }> = { $kind: "heredoc", heredoc: null };
        slots.push(slot);
        openSlots.push(slot);
        break;
      }
      case "copy_pathspec":
        slots.push({ $kind: "path", value: parseString(child) });
        break;
      case "heredoc_body": {
        const body = matcher.body(child);
        if (!body.ok) return body;
        break;
      }
      case "heredoc_terminator": {
        const closed = matcher.close(child);
        if (!closed.ok) return closed;
        // The matcher closes in opener order, so the oldest open slot is the one.
        const slot = openSlots.shift();
        if (slot) slot.heredoc = closed.value;
        resolved++;
        break;
      }
      case "comment":
        continue;
      default:
        return err(unexpectedToken(child));
    }
  }

  const finished = matcher.finish();
  if (!finished.ok) return finished;
  if (resolved === 0) return err(genericParseError(ARITY_MESSAGE, node.span));

  let destinationIndex = -1;
  slots.forEach((slot, i) => {
    if (slot.$kind === "path") destinationIndex = i;
  });
  const destinationSlot = slots[destinationIndex];
  if (!destinationSlot || destinationSlot.$kind !== "path") {
    return err(genericParseError("copy requires a destination", node.span));
  }

  const sources: SourceType[] = [];
  slots.forEach((slot, i) => {
    if (i === destinationIndex) return;
    if (slot.$kind === "path") {
      sources.push({ $kind: "file-name", value: slot.value });
    } else if (slot.heredoc) {
      sources.push({ $kind: "file-contents", value: slot.heredoc.body, heredoc: slot.heredoc });
    }
  });

  return ok({
    $kind: "copy",
    span: node.span,
    flags,
    sources,
    destination: destinationSlot.value,
  });
}
