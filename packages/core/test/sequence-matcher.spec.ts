import { describe, expect, test } from "vitest";
import {
  editTokens,
  matchChars,
  matchSequences,
  toChars,
} from "../src/sequence-matcher.js";

describe("matchSequences", () => {
  test("groups a changed middle line into a replace run", () => {
    expect(matchSequences(["a", "b", "c"], ["a", "x", "c"])).toEqual([
      { tag: "equal", oldStart: 0, oldEnd: 1, newStart: 0, newEnd: 1 },
      { tag: "replace", oldStart: 1, oldEnd: 2, newStart: 1, newEnd: 2 },
      { tag: "equal", oldStart: 2, oldEnd: 3, newStart: 2, newEnd: 3 },
    ]);
  });

  test("reports pure insertions and deletions", () => {
    expect(matchSequences(["a"], ["a", "b"])).toEqual([
      { tag: "equal", oldStart: 0, oldEnd: 1, newStart: 0, newEnd: 1 },
      { tag: "insert", oldStart: 1, oldEnd: 1, newStart: 1, newEnd: 2 },
    ]);
    expect(matchSequences(["a", "b"], ["b"])).toEqual([
      { tag: "delete", oldStart: 0, oldEnd: 1, newStart: 0, newEnd: 0 },
      { tag: "equal", oldStart: 1, oldEnd: 2, newStart: 0, newEnd: 1 },
    ]);
  });

  test("returns no opcodes for two empty inputs", () => {
    expect(matchSequences([], [])).toEqual([]);
  });

  test("falls back to the linear-space matcher for large inputs", () => {
    const oldLines = Array.from(
      { length: 1500 },
      (_, index) => `line ${index}`
    );
    const newLines = oldLines.map((line, index) =>
      index === 700 ? "changed" : line
    );
    expect(matchSequences(oldLines, newLines)).toEqual([
      { tag: "equal", oldStart: 0, oldEnd: 700, newStart: 0, newEnd: 700 },
      {
        tag: "replace",
        oldStart: 700,
        oldEnd: 701,
        newStart: 700,
        newEnd: 701,
      },
      {
        tag: "equal",
        oldStart: 701,
        oldEnd: 1500,
        newStart: 701,
        newEnd: 1500,
      },
    ]);
  });

  test("keeps a separate deletion and insertion apart on large inputs", () => {
    const oldLines = Array.from(
      { length: 1500 },
      (_, index) => `line ${index}`
    );
    const newLines = [
      ...oldLines.slice(0, 100),
      ...oldLines.slice(101, 1001),
      "added",
      ...oldLines.slice(1001),
    ];
    expect(matchSequences(oldLines, newLines)).toEqual([
      { tag: "equal", oldStart: 0, oldEnd: 100, newStart: 0, newEnd: 100 },
      {
        tag: "delete",
        oldStart: 100,
        oldEnd: 101,
        newStart: 100,
        newEnd: 100,
      },
      {
        tag: "equal",
        oldStart: 101,
        oldEnd: 1001,
        newStart: 100,
        newEnd: 1000,
      },
      {
        tag: "insert",
        oldStart: 1001,
        oldEnd: 1001,
        newStart: 1000,
        newEnd: 1001,
      },
      {
        tag: "equal",
        oldStart: 1001,
        oldEnd: 1500,
        newStart: 1001,
        newEnd: 1500,
      },
    ]);
  });

  test("matches thousands of entirely different lines as one replace", () => {
    const oldLines = Array.from({ length: 4000 }, (_, index) => `old ${index}`);
    const newLines = Array.from({ length: 4000 }, (_, index) => `new ${index}`);
    expect(matchSequences(oldLines, newLines)).toEqual([
      {
        tag: "replace",
        oldStart: 0,
        oldEnd: 4000,
        newStart: 0,
        newEnd: 4000,
      },
    ]);
  });
});

describe("character matching", () => {
  test("splits strings by code point", () => {
    expect(toChars("a😀b")).toEqual(["a", "😀", "b"]);
  });

  test("matchChars aligns a common prefix", () => {
    expect(matchChars("bar", "baz")).toEqual([
      { tag: "equal", oldStart: 0, oldEnd: 2, newStart: 0, newEnd: 2 },
      { tag: "replace", oldStart: 2, oldEnd: 3, newStart: 2, newEnd: 3 },
    ]);
  });

  test("editTokens lists deletions before insertions", () => {
    expect(editTokens("bar", "baz")).toEqual([
      "equal",
      "equal",
      "delete",
      "insert",
    ]);
    expect(editTokens("", "ab")).toEqual(["insert", "insert"]);
    expect(editTokens("same", "same")).toEqual([
      "equal",
      "equal",
      "equal",
      "equal",
    ]);
  });
});
