import { describe, expect, test } from "vitest";
import { normalizeArgv } from "../src/argv.js";

const head = ["node", "lineweave"];

describe("normalizeArgv", () => {
  test("moves trailing options ahead of diff positionals", () => {
    expect(
      normalizeArgv([...head, "diff", "a.txt", "b.txt", "--format", "plain"])
    ).toEqual([...head, "diff", "--format", "plain", "a.txt", "b.txt"]);
  });

  test("does not let boolean flags swallow a positional", () => {
    expect(
      normalizeArgv([...head, "diff", "a.txt", "-s", "b.txt", "--width=90"])
    ).toEqual([...head, "diff", "-s", "--width=90", "a.txt", "b.txt"]);
  });

  test("treats a lone dash as stdin rather than an option", () => {
    expect(
      normalizeArgv([...head, "diff", "-", "b.txt", "--context", "2"])
    ).toEqual([...head, "diff", "--context", "2", "-", "b.txt"]);
  });

  test("keeps everything after -- positional", () => {
    expect(
      normalizeArgv([...head, "explain", "--verbose", "--", "-odd", "b"])
    ).toEqual([...head, "explain", "--verbose", "-odd", "b"]);
  });

  test("leaves other commands untouched", () => {
    const argv = [...head, "git-external", "diff", "old", "--x"];
    expect(normalizeArgv(argv)).toEqual(argv);
    expect(normalizeArgv(head)).toEqual(head);
  });
});
