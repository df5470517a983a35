export const LINE_SPLIT_RE = /\r?\n/;
const TRAILING_LINE_BREAK_RE = /\r?\n$/;

/**
 * Splits text into lines. A final line break ends the last line rather than
 * opening an empty one: `"a\n"` is one line, `"\n"` is one empty line and
 * `""` has none.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  return text.replace(TRAILING_LINE_BREAK_RE, "").split(LINE_SPLIT_RE);
}

export function isBinaryText(text: string) {
  return text.includes("\u0000");
}
