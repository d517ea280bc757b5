import { BreakableString } from "../model/breakable-string.js";
import { unexpectedToken } from "../model/errors.js";
import type { TokenNode } from "../model/tokens.js";
import { err, ok, type Result } from "../shared/result.js";

/**
 * Build a {@link BreakableString} from an `any_breakable` node.
 *
 * Literal text is kept verbatim, leading indentation of continuation lines
 * included. Comment lines become comment fragments.
 */
export function parseBreakable(node: TokenNode): Result<BreakableString> {
  if (node.kind !== "any_breakable") return err(unexpectedToken(node));

  let breakable = new BreakableString(node.span);
  for (const child of node.children) {
    switch (child.kind) {
      case "shell_literal":
        breakable = breakable.addLiteral(child.span, child.text);
        break;
      case "shell_comment":
        breakable = breakable.addComment(child.span, child.text);
        break;
      default:
        return err(unexpectedToken(child));
    }
  }
  return ok(breakable);
}
