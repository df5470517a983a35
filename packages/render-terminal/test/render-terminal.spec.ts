import { buildDiffDocument } from "@lineweave/core";
import { describe, expect, test } from "vitest";
import { renderTerminal } from "../src/index.js";

const ESC = "\u001b[";
const sample = buildDiffDocument("a\nbar\nc\n", "a\nbaz\nc\nd\n");

describe("renderTerminal unified", () => {
  test("prints plain lines with change markers", () => {
    expect(renderTerminal(sample, { format: "plain" })).toBe(
      ["  a", "- bar", "+ baz", "  c", "+ d"].join("\n")
    );
  });

  test("highlights changed characters of a paired line", () => {
    const lines = renderTerminal(sample).split("\n");
    expect(lines[1]).toBe(
      `${ESC}31m- ${ESC}0m${ESC}31mba${ESC}0m${ESC}30;41mr${ESC}0m`
    );
    expect(lines[2]).toBe(
      `${ESC}32m+ ${ESC}0m${ESC}32mba${ESC}0m${ESC}30;42mz${ESC}0m`
    );
    expect(lines[4]).toBe(`${ESC}32m+ d${ESC}0m`);
  });

  test("prints every old line of a replace block before the new ones", () => {
    const document = buildDiffDocument("abcdef\nuvwxyz\n", "uvwxyq\n");
    expect(renderTerminal(document, { format: "plain" })).toBe(
      ["- abcdef", "- uvwxyz", "+ uvwxyq"].join("\n")
    );
    expect(renderTerminal(document).split("\n")[0]).toBe(
      `${ESC}31m- ${ESC}0m${ESC}30;41mabcdef${ESC}0m`
    );
  });

  test("labels folded context", () => {
    const oldLines = Array.from({ length: 10 }, (_, index) => `l${index + 1}`);
    const newLines = oldLines.map((line) => (line === "l5" ? "X" : line));
    const document = buildDiffDocument(
      oldLines.join("\n"),
      newLines.join("\n"),
      { context: 1 }
    );
    expect(renderTerminal(document, { format: "plain" })).toBe(
      [
        "… 3 lines hidden …",
        "  l4",
        "- l5",
        "+ X",
        "  l6",
        "… 4 lines hidden …",
      ].join("\n")
    );
  });

  test("reports identical inputs", () => {
    expect(renderTerminal(buildDiffDocument("a\nb", "a\nb"))).toBe(
      "No line changes detected."
    );
    expect(renderTerminal(buildDiffDocument("", ""))).toBe(
      "No line changes detected."
    );
  });
});

describe("renderTerminal side-by-side", () => {
  test("numbers both columns and pads the left one", () => {
    expect(
      renderTerminal(sample, {
        format: "plain",
        layout: "side-by-side",
        width: 21,
      })
    ).toBe(
      [
        "1: a      │1: a",
        "2: bar    │2: baz",
        "3: c      │3: c",
        "          │4: d",
      ].join("\n")
    );
  });

  test("wraps long lines onto continuation rows", () => {
    const document = buildDiffDocument("", "abcdefghij\n");
    expect(
      renderTerminal(document, {
        format: "plain",
        layout: "side-by-side",
        width: 21,
      })
    ).toBe(["          │1: abcdefg", "          │   hij"].join("\n"));
  });

  test("expands tabs before wrapping", () => {
    const document = buildDiffDocument("", "\tx\n");
    expect(
      renderTerminal(document, {
        format: "plain",
        layout: "side-by-side",
        width: 21,
        tabSize: 2,
      })
    ).toBe("          │1:   x");
  });

  test("styles numbers and reverses changed characters", () => {
    const line = renderTerminal(sample, {
      layout: "side-by-side",
      width: 21,
    }).split("\n")[1];
    expect(line).toBe(
      `${ESC}1m2:${ESC}0m ${ESC}38;5;217mba${ESC}0m${ESC}38;5;217;7mr${ESC}0m` +
        `    │${ESC}1m2:${ESC}0m ${ESC}38;5;157mba${ESC}0m` +
        `${ESC}38;5;157;7mz${ESC}0m`
    );
  });

  test("reverses whole lines of inserted and deleted blocks", () => {
    const inserted = renderTerminal(sample, {
      layout: "side-by-side",
      width: 21,
    }).split("\n")[3];
    expect(inserted).toBe(
      `          │${ESC}1m4:${ESC}0m ${ESC}38;5;157;7md${ESC}0m`
    );
    const deleted = renderTerminal(buildDiffDocument("a\nb\n", "a\n"), {
      layout: "side-by-side",
      width: 21,
    }).split("\n")[1];
    expect(deleted).toBe(
      `${ESC}1m2:${ESC}0m ${ESC}38;5;217;7mb${ESC}0m      │   `
    );
  });

  test("keeps at least one column of text on narrow terminals", () => {
    const document = buildDiffDocument("", "ab\n");
    expect(
      renderTerminal(document, {
        format: "plain",
        layout: "side-by-side",
        width: 1,
      })
    ).toBe(["    │1: a", "    │   b"].join("\n"));
  });
});
