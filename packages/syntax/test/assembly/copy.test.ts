import { describe, test, expect } from "vitest";

import { assembleCopy, parseCopyFlag } from "../../src/assembly/copy.js";
import { treeOver, unwrap, unwrapErr } from "../_helpers/tree.js";

describe("assembleCopy: standard form", () => {
  test("the last path is the destination", () => {
    const source = "copy foo bar";
    const { node, at } = treeOver(source);
    const tree = node("copy", 0, 12, [
      node("copy_standard", 5, 12, [at("copy_pathspec", "foo"), at("copy_pathspec", "bar")]),
    ]);

    expect(unwrap(assembleCopy(tree))).toEqual({
      $kind: "copy",
      span: { start: 0, end: 12 },
      flags: [],
      sources: [{ $kind: "file-name", value: { span: { start: 5, end: 8 }, content: "foo" } }],
      destination: { span: { start: 9, end: 12 }, content: "bar" },
    });
  });

  test("flags keep name and value spans", () => {
    const source = "copy --from=alpine:3.10 /usr/lib/libssl.so.1.1 /tmp/";
    const { node, at } = treeOver(source);
    const flag = at("copy_flag", "--from=alpine:3.10", 0, [
      at("copy_flag_name", "from"),
      at("copy_flag_value", "alpine:3.10"),
    ]);
    const tree = node("copy", 0, 52, [
      node("copy_standard", 5, 52, [flag, at("copy_pathspec", "/usr/lib/libssl.so.1.1"), at("copy_pathspec", "/tmp/")]),
    ]);

    const copy = unwrap(assembleCopy(tree));
    expect(copy.flags).toEqual([
      {
        span: { start: 5, end: 23 },
        name: { span: { start: 7, end: 11 }, content: "from" },
        value: { span: { start: 12, end: 23 }, content: "alpine:3.10" },
      },
    ]);
    expect(copy.sources).toEqual([
      { $kind: "file-name", value: { span: { start: 24, end: 46 }, content: "/usr/lib/libssl.so.1.1" } },
    ]);
    expect(copy.destination).toEqual({ span: { start: 47, end: 52 }, content: "/tmp/" });
  });

  test("quoted paths are decoded and comments skipped", () => {
    const source = 'COPY "my file" \\\n# note\n /dst';
    const { node, at } = treeOver(source);
    const tree = node("copy", 0, source.length, [
      node("copy_standard", 5, source.length, [
        at("copy_pathspec", '"my file"'),
        at("comment", "# note"),
        at("copy_pathspec", "/dst"),
      ]),
    ]);

    const copy = unwrap(assembleCopy(tree));
    expect(copy.sources).toEqual([{ $kind: "file-name", value: { span: { start: 5, end: 14 }, content: "my file" } }]);
    expect(copy.destination.content).toBe("/dst");
  });

  test("a single path is not enough", () => {
    const { node, at } = treeOver("COPY foo");
    const error = unwrapErr(assembleCopy(node("copy", 0, 8, [node("copy_standard", 5, 8, [at("copy_pathspec", "foo")])])));
    expect(error).toEqual({
      $kind: "GenericParseError",
      message: "copy requires at least one source and a destination",
      span: { start: 0, end: 8 },
    });
  });

  test("the instruction needs exactly one form", () => {
    const { node } = treeOver("COPY a b");
    expect(unwrapErr(assembleCopy(node("copy", 0, 8))).message).toBe("copy instruction expected a field");

    const twice = node("copy", 0, 8, [node("copy_standard", 5, 6), node("copy_standard", 7, 8)]);
    expect(unwrapErr(assembleCopy(twice))).toMatchObject({ $kind: "UnexpectedToken", span: { start: 7, end: 8 } });

    const wrongForm = node("copy", 0, 8, [node("run_exec", 5, 8)]);
    expect(unwrapErr(assembleCopy(wrongForm))).toMatchObject({ $kind: "UnexpectedToken", rule: "run_exec" });
    expect(unwrapErr(assembleCopy(node("run", 0, 8))).$kind).toBe("UnexpectedToken");
  });
});

describe("parseCopyFlag", () => {
  test("requires both key and value", () => {
    const { node, at } = treeOver("COPY --chown= --=x a b");
    expect(unwrapErr(parseCopyFlag(at("copy_flag", "--chown=", 0, [at("copy_flag_name", "chown")])))).toEqual({
      $kind: "GenericParseError",
      message: "copy flags require a value",
      span: { start: 5, end: 13 },
    });
    expect(unwrapErr(parseCopyFlag(at("copy_flag", "--=x", 0, [at("copy_flag_value", "x")]))).message).toBe(
      "copy flags require a key",
    );
    expect(unwrapErr(parseCopyFlag(node("copy_pathspec", 19, 20))).$kind).toBe("UnexpectedToken");
  });
});

describe("assembleCopy: heredoc form", () => {
  test("one heredoc becomes a file-contents source", () => {
    const source = "COPY <<EOF /tmp/test.txt\nhello\nEOF\n";
    const { node, at } = treeOver(source);
    const tree = node("copy", 0, 35, [
      node("copy_heredoc", 5, 35, [
        at("heredoc_delimiter", "<<EOF"),
        at("copy_pathspec", "/tmp/test.txt"),
        at("heredoc_body", "hello\n"),
        at("heredoc_terminator", "EOF\n", 10),
      ]),
    ]);

    const copy = unwrap(assembleCopy(tree));
    expect(copy.destination).toEqual({ span: { start: 11, end: 24 }, content: "/tmp/test.txt" });
    expect(copy.sources).toHaveLength(1);
    const [source0] = copy.sources;
    expect(source0?.$kind).toBe("file-contents");
    expect(source0?.value).toEqual({ span: { start: 25, end: 31 }, content: "hello\n" });
    if (source0?.$kind !== "file-contents") return;
    expect(source0.heredoc.span).toEqual({ start: 5, end: 35 });
    expect(source0.heredoc.terminator).toEqual({ span: { start: 31, end: 35 }, content: "EOF\n" });
  });

  test("several heredocs keep opener order, mixed with paths", () => {
    const source = "COPY <<A extra.txt <<B /dst\none\nA\ntwo\nB\n";
    const { node, at } = treeOver(source);
    const tree = node("copy", 0, source.length, [
      node("copy_heredoc", 5, source.length, [
        at("heredoc_delimiter", "<<A"),
        at("copy_pathspec", "extra.txt"),
        at("heredoc_delimiter", "<<B"),
        at("copy_pathspec", "/dst"),
        at("heredoc_body", "one\n"),
        at("heredoc_terminator", "A\n", 28),
        at("heredoc_body", "two\n"),
        at("heredoc_terminator", "B\n", 28),
      ]),
    ]);

    const copy = unwrap(assembleCopy(tree));
    expect(copy.sources.map((s) => [s.$kind, s.value.content])).toEqual([
      ["file-contents", "one\n"],
      ["file-name", "extra.txt"],
      ["file-contents", "two\n"],
    ]);
    expect(copy.destination.content).toBe("/dst");
  });

  test("heredocs without a destination path fail", () => {
    const source = "COPY <<EOF\nx\nEOF\n";
    const { node, at } = treeOver(source);
    const tree = node("copy", 0, 17, [
      node("copy_heredoc", 5, 17, [
        at("heredoc_delimiter", "<<EOF"),
        at("heredoc_body", "x\n"),
        at("heredoc_terminator", "EOF\n", 10),
      ]),
    ]);
    expect(unwrapErr(assembleCopy(tree))).toEqual({
      $kind: "GenericParseError",
      message: "copy requires a destination",
      span: { start: 0, end: 17 },
    });
  });

  test("unclosed openers and stray terminators surface from the matcher", () => {
    const source = "COPY <<EOF /dst\nEOF\n";
    const { node, at } = treeOver(source);
    const unclosed = node("copy", 0, 15, [
      node("copy_heredoc", 5, 15, [at("heredoc_delimiter", "<<EOF"), at("copy_pathspec", "/dst")]),
    ]);
    expect(unwrapErr(assembleCopy(unclosed))).toMatchObject({ $kind: "UnmatchedHeredocDelimiter", delimiters: ["EOF"] });

    const stray = node("copy", 0, 20, [
      node("copy_heredoc", 11, 20, [at("copy_pathspec", "/dst"), at("heredoc_terminator", "EOF\n", 10)]),
    ]);
    expect(unwrapErr(assembleCopy(stray)).$kind).toBe("UnmatchedHeredocTerminator");
  });

  test("a heredoc form with no resolved heredoc is an arity error", () => {
    const { node, at } = treeOver("COPY a b");
    const tree = node("copy", 0, 8, [node("copy_heredoc", 5, 8, [at("copy_pathspec", "a"), at("copy_pathspec", "b")])]);
    expect(unwrapErr(assembleCopy(tree)).message).toBe("copy requires at least one source and a destination");
  });
});
