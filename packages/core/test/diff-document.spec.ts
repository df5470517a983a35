import { describe, expect, test } from "vitest";
import {
  buildDiffDocument,
  buildReplaceBlock,
  charSegments,
} from "../src/diff-document.js";
import { isBinaryText, splitLines } from "../src/lines.js";
import { renderJson } from "../src/render-json.js";

const numbered = (count: number) =>
  Array.from({ length: count }, (_, index) => `l${index + 1}`);

describe("splitLines", () => {
  test("treats a final line break as a terminator", () => {
    expect(splitLines("")).toEqual([]);
    expect(splitLines("\n")).toEqual([""]);
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
    expect(splitLines("a")).toEqual(["a"]);
  });

  test("flags text containing NUL as binary", () => {
    expect(isBinaryText("plain text")).toBe(false);
    expect(isBinaryText("PK\u0000\u0003")).toBe(true);
  });
});

describe("charSegments", () => {
  test("splits a pair into shared and changed runs", () => {
    expect(charSegments("bar", "baz")).toEqual({
      oldSegments: [
        { type: "equal", text: "ba" },
        { type: "delete", text: "r" },
      ],
      newSegments: [
        { type: "equal", text: "ba" },
        { type: "insert", text: "z" },
      ],
    });
  });

  test("leaves one side without changed runs for a pure insertion", () => {
    expect(charSegments("ab", "abc")).toEqual({
      oldSegments: [{ type: "equal", text: "ab" }],
      newSegments: [
        { type: "equal", text: "ab" },
        { type: "insert", text: "c" },
      ],
    });
  });
});

describe("buildDiffDocument", () => {
  test("aligns a replaced line between equal runs", () => {
    expect(buildDiffDocument("a\nb\nc\n", "a\nB\nc\n")).toEqual({
      version: "0.1.0",
      oldLineCount: 3,
      newLineCount: 3,
      blocks: [
        { type: "equal", oldStart: 1, newStart: 1, lines: ["a"] },
        {
          type: "replace",
          aligned: true,
          rows: [
            {
              type: "pair",
              oldLine: 2,
              newLine: 2,
              oldText: "b",
              newText: "B",
              oldSegments: [{ type: "delete", text: "b" }],
              newSegments: [{ type: "insert", text: "B" }],
            },
          ],
        },
        { type: "equal", oldStart: 3, newStart: 3, lines: ["c"] },
      ],
    });
  });

  test("keeps pure insertions and deletions as their own blocks", () => {
    expect(buildDiffDocument("", "x\n").blocks).toEqual([
      { type: "insert", newStart: 1, lines: ["x"] },
    ]);
    expect(buildDiffDocument("a\nb\n", "a\n").blocks).toEqual([
      { type: "equal", oldStart: 1, newStart: 1, lines: ["a"] },
      { type: "delete", oldStart: 2, lines: ["b"] },
    ]);
  });

  test("folds leading and trailing context", () => {
    const oldLines = numbered(10);
    const newLines = oldLines.map((line) => (line === "l5" ? "X" : line));
    const document = buildDiffDocument(
      oldLines.join("\n"),
      newLines.join("\n"),
      { context: 1 }
    );
    expect(document.blocks).toEqual([
      { type: "gap", hidden: 3 },
      { type: "equal", oldStart: 4, newStart: 4, lines: ["l4"] },
      {
        type: "replace",
        aligned: true,
        rows: [
          { type: "delete", oldLine: 5, oldText: "l5" },
          { type: "insert", newLine: 5, newText: "X" },
        ],
      },
      { type: "equal", oldStart: 6, newStart: 6, lines: ["l6"] },
      { type: "gap", hidden: 4 },
    ]);
  });

  test("keeps context on both sides of an interior run", () => {
    const document = buildDiffDocument(
      "a\nb\nc\nd\ne\nf\ng",
      "A\nb\nc\nd\ne\nf\nG",
      { context: 1 }
    );
    expect(
      document.blocks.map((block) =>
        block.type === "replace" ? block.rows.map((row) => row.type) : block
      )
    ).toEqual([
      ["pair"],
      { type: "equal", oldStart: 2, newStart: 2, lines: ["b"] },
      { type: "gap", hidden: 3 },
      { type: "equal", oldStart: 6, newStart: 6, lines: ["f"] },
      ["pair"],
    ]);
  });

  test("hides an unchanged file entirely when context is set", () => {
    expect(buildDiffDocument("a\nb", "a\nb", { context: 2 }).blocks).toEqual([
      { type: "gap", hidden: 2 },
    ]);
    expect(buildDiffDocument("a\nb", "a\nb").blocks).toEqual([
      { type: "equal", oldStart: 1, newStart: 1, lines: ["a", "b"] },
    ]);
  });

  test("treats zero context as no folding", () => {
    const oldText = numbered(10).join("\n");
    const newText = oldText.replace("l5", "X");
    const document = buildDiffDocument(oldText, newText, { context: 0 });
    expect(document).toEqual(buildDiffDocument(oldText, newText));
    expect(document.blocks.map((block) => block.type)).toEqual([
      "equal",
      "replace",
      "equal",
    ]);
  });

  test("leaves oversized replace blocks unaligned", () => {
    expect(
      buildReplaceBlock(["old one", "old two"], ["new"], 3, 7, {
        maxAlignmentCells: 1,
      })
    ).toEqual({
      type: "replace",
      aligned: false,
      rows: [
        { type: "delete", oldLine: 3, oldText: "old one" },
        { type: "delete", oldLine: 4, oldText: "old two" },
        { type: "insert", newLine: 7, newText: "new" },
      ],
    });
  });

  test("renderJson emits the document as indented JSON", () => {
    const document = buildDiffDocument("a\nb\n", "a\nc\n");
    const json = renderJson(document);
    expect(json.split("\n")[1]).toBe('  "version": "0.1.0",');
    expect(JSON.parse(json)).toEqual(document);
  });
});
