import { describe, test, expect } from "vitest";

import { spanContains, type Heredoc, type Instruction, type Span, type TokenNode } from "@buildspan/syntax";

import { parseInstruction } from "../src/parse.js";
import { tokenizeInstruction } from "../src/tokenize.js";
import { outline, unwrap, unwrapErr } from "./_helpers/result.js";

function everyNode(node: TokenNode): TokenNode[] {
  return [node, ...node.children.flatMap(everyNode)];
}

function heredocSpans(heredoc: Heredoc): Span[] {
  const { span, delimiter, trailer, body, terminator } = heredoc;
  return [span, delimiter.span, ...(trailer ? [trailer.span] : []), body.span, terminator.span];
}

/** Every span an assembled record carries, below the instruction itself. */
function recordSpans(instruction: Instruction): Span[] {
  if (instruction.$kind === "copy") {
    return [
      ...instruction.flags.flatMap((f) => [f.span, f.name.span, f.value.span]),
      ...instruction.sources.flatMap((s) =>
        s.$kind === "file-contents" ? [s.value.span, ...heredocSpans(s.heredoc)] : [s.value.span],
      ),
      instruction.destination.span,
    ];
  }
  const options = instruction.options.flatMap((o) => [o.span, o.name.span, o.value.span]);
  const { expr } = instruction;
  if (expr.$kind === "exec") {
    return [...options, expr.array.span, ...expr.array.elements.map((e) => e.span)];
  }
  const shell = [expr.shell.span, ...expr.shell.components.map((c) => c.span)];
  return [...options, ...shell, ...(expr.$kind === "shell-with-heredoc" ? heredocSpans(expr.heredoc) : [])];
}

const CONTAINMENT_SOURCES = [
  "COPY --chown=app <<A <<B /dst\none\nA\ntwo\nB\n",
  "RUN --network=none tee <<EOF /out\n\nEOF\n",
  'RUN ["sh", \\\n  # keep\n  "-c", "true"]',
  "RUN a \\\n  # one\n  b \\\n\n  c",
  "COPY --chmod=644 café /données/",
  "RUN <<EOF\n€ 😀\nEOF\n",
];

describe("tokenizeInstruction", () => {
  test("keywords are case-insensitive", () => {
    expect(unwrap(tokenizeInstruction("copy a b")).node.kind).toBe("copy");
    expect(unwrap(tokenizeInstruction("Run make")).node.kind).toBe("run");
  });

  test("empty or comment-only input has no instruction", () => {
    expect(unwrapErr(tokenizeInstruction(""))).toEqual({
      $kind: "GenericParseError",
      message: "expected an instruction",
      span: { start: 0, end: 0 },
    });
    expect(unwrapErr(tokenizeInstruction("   \n# only\n")).span).toEqual({ start: 11, end: 11 });
  });

  test("lines that do not start with a keyword are rejected", () => {
    expect(unwrapErr(tokenizeInstruction("123 foo"))).toEqual({
      $kind: "GenericParseError",
      message: "expected an instruction keyword",
      span: { start: 0, end: 7 },
    });
    expect(unwrapErr(tokenizeInstruction("FROM alpine"))).toEqual({
      $kind: "GenericParseError",
      message: "unsupported instruction: FROM",
      span: { start: 0, end: 4 },
    });
  });

  test("the returned end lets a caller walk consecutive instructions", () => {
    const source = "COPY a b\n\n# note\nRUN make\n";
    const first = unwrap(tokenizeInstruction(source));
    expect(first.node.span).toEqual({ start: 0, end: 8 });
    expect(first.end).toBe(9);

    const second = unwrap(tokenizeInstruction(source, { offset: first.end }));
    expect(second.node.span).toEqual({ start: 17, end: 25 });
    expect(second.end).toBe(26);

    expect(unwrapErr(tokenizeInstruction(source, { offset: second.end })).message).toBe("expected an instruction");
  });

  test("trailing spaces belong to the instruction", () => {
    const tokenized = unwrap(tokenizeInstruction("COPY a b   \nRUN x"));
    expect(tokenized.node.span).toEqual({ start: 0, end: 11 });
    expect(tokenized.end).toBe(12);
  });

  test("the backtick escape continues lines only when configured", () => {
    const source = "RUN foo `\nbar";
    const withBacktick = unwrap(parseInstruction(source, { escape: "`" }));
    expect(withBacktick.span).toEqual({ start: 0, end: 13 });
    expect(withBacktick.$kind === "run" && withBacktick.expr.$kind === "shell" && withBacktick.expr.shell.effectiveText()).toBe(
      "foo bar",
    );

    const tokenized = unwrap(tokenizeInstruction(source));
    expect(outline(tokenized.node)).toEqual([
      "run 0..9",
      "  run_shell 4..9",
      "    any_breakable 4..9",
      "      shell_literal 4..9",
    ]);
    expect(tokenized.end).toBe(10);
  });

  test("every child span lies inside its parent", () => {
    for (const source of CONTAINMENT_SOURCES) {
      const bytes = Buffer.from(source, "utf8");
      const root = unwrap(tokenizeInstruction(source)).node;
      for (const node of everyNode(root)) {
        for (const child of node.children) {
          expect(spanContains(node.span, child.span)).toBe(true);
        }
        expect(node.text).toBe(bytes.subarray(node.span.start, node.span.end).toString("utf8"));
      }
    }
  });

  test("offsets and spans count UTF-8 bytes", () => {
    const source = "COPY é /x\nRUN a\n";
    const first = unwrap(tokenizeInstruction(source));
    expect(first.node.span).toEqual({ start: 0, end: 10 });
    expect(first.end).toBe(11);

    const second = unwrap(tokenizeInstruction(source, { offset: first.end }));
    expect(second.node.span).toEqual({ start: 11, end: 16 });
    expect(second.end).toBe(17);
  });
});

describe("parseInstruction", () => {
  test("tokenizer and assembler failures both come back as results", () => {
    expect(unwrapErr(parseInstruction("COPY foo"))).toEqual({
      $kind: "GenericParseError",
      message: "copy requires at least one source and a destination",
      span: { start: 0, end: 8 },
    });
    expect(unwrapErr(parseInstruction("RUN"))).toEqual({
      $kind: "GenericParseError",
      message: "missing run expression",
      span: { start: 0, end: 3 },
    });
    expect(unwrapErr(parseInstruction("")).message).toBe("expected an instruction");
  });

  test("every record span lies inside its instruction", () => {
    for (const source of CONTAINMENT_SOURCES) {
      const instruction = unwrap(parseInstruction(source));
      const spans = recordSpans(instruction);
      expect(spans.length).toBeGreaterThan(2);
      for (const span of spans) {
        expect(spanContains(instruction.span, span)).toBe(true);
      }
    }
  });
});
