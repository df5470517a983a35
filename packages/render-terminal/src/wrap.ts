/** A run of text that is either shown as-is or emphasized. */
export interface Span {
  text: string;
  emphasis: boolean;
}

export function spanWidth(spans: readonly Span[]) {
  return spans.reduce(
    (width, span) => width + Array.from(span.text).length,
    0
  );
}

/** Replaces tabs with spaces up to the next stop, counting across spans. */
export function expandTabs(spans: readonly Span[], tabSize: number): Span[] {
  const size = Math.max(1, tabSize);
  let column = 0;
  return spans.map((span) => {
    let text = "";
    for (const char of span.text) {
      if (char === "\t") {
        const fill = size - (column % size);
        text += " ".repeat(fill);
        column += fill;
        continue;
      }
      text += char;
      column += 1;
    }
    return { text, emphasis: span.emphasis };
  });
}

/**
 * Hard-wraps spans into rows of at most `width` code points. Always yields at
 * least one row, so an empty line still occupies a row.
 */
export function wrapSpans(spans: readonly Span[], width: number): Span[][] {
  const limit = Math.max(1, width);
  const rows: Span[][] = [[]];
  let used = 0;

  for (const span of spans) {
    let chars = Array.from(span.text);
    while (chars.length > 0) {
      if (used === limit) {
        rows.push([]);
        used = 0;
      }
      const take = chars.slice(0, limit - used);
      rows.at(-1)?.push({ text: take.join(""), emphasis: span.emphasis });
      used += take.length;
      chars = chars.slice(take.length);
    }
  }

  return rows;
}
