import type { CharSegment, DiffBlock, DiffDocument } from "@lineweave/core";
import type { Painter, StyleName } from "./styles.js";
import { gapLabel } from "./unified.js";
import { expandTabs, type Span, spanWidth, wrapSpans } from "./wrap.js";

const SEPARATOR = "│";

type Tone = "plain" | "remove" | "add";

interface Cell {
  line: number;
  tone: Tone;
  spans: Span[];
}

type Row =
  | { kind: "lines"; left?: Cell; right?: Cell }
  | { kind: "gap"; hidden: number };

interface WrappedLine {
  line?: number;
  tone: Tone;
  spans: Span[];
}

export interface SideBySideLayout {
  numberWidth: number;
  column: number;
  tabSize: number;
}

export function sideBySideLayout(
  document: DiffDocument,
  width: number,
  tabSize: number
): SideBySideLayout {
  const numberWidth = String(
    Math.max(document.oldLineCount, document.newLineCount, 1)
  ).length;
  const column = Math.max(
    1,
    Math.floor((width - SEPARATOR.length) / 2) - (numberWidth + 2)
  );
  return { numberWidth, column, tabSize };
}

const plain = (text: string): Span[] => [{ text, emphasis: false }];
const emphasized = (text: string): Span[] => [{ text, emphasis: true }];
const cell = (line: number, tone: Tone, spans: Span[]): Cell => ({
  line,
  tone,
  spans,
});
const fromSegments = (segments: readonly CharSegment[]): Span[] =>
  segments.map((segment) => ({
    text: segment.text,
    emphasis: segment.type !== "equal",
  }));

function blockRows(block: DiffBlock): Row[] {
  switch (block.type) {
    case "equal":
      return block.lines.map((text, index): Row => ({
        kind: "lines",
        left: cell(block.oldStart + index, "plain", plain(text)),
        right: cell(block.newStart + index, "plain", plain(text)),
      }));
    case "gap":
      return [{ kind: "gap", hidden: block.hidden }];
    case "delete":
      return block.lines.map((text, index): Row => ({
        kind: "lines",
        left: cell(block.oldStart + index, "remove", emphasized(text)),
      }));
    case "insert":
      return block.lines.map((text, index): Row => ({
        kind: "lines",
        right: cell(block.newStart + index, "add", emphasized(text)),
      }));
    default:
      return block.rows.map((row): Row => {
        switch (row.type) {
          case "pair":
            return {
              kind: "lines",
              left: cell(row.oldLine, "remove", fromSegments(row.oldSegments)),
              right: cell(row.newLine, "add", fromSegments(row.newSegments)),
            };
          case "delete":
            return {
              kind: "lines",
              left: cell(row.oldLine, "remove", emphasized(row.oldText)),
            };
          default:
            return {
              kind: "lines",
              right: cell(row.newLine, "add", emphasized(row.newText)),
            };
        }
      });
  }
}

function wrapCell(
  source: Cell | undefined,
  layout: SideBySideLayout
): WrappedLine[] {
  if (!source) {
    return [{ tone: "plain", spans: [] }];
  }
  const spans = expandTabs(source.spans, layout.tabSize);
  return wrapSpans(spans, layout.column).map((row, index) =>
    index === 0
      ? { line: source.line, tone: source.tone, spans: row }
      : { tone: source.tone, spans: row }
  );
}

function spanStyle(tone: Tone, span: Span): StyleName | undefined {
  switch (tone) {
    case "remove":
      return span.emphasis ? "removeHighlight" : "remove";
    case "add":
      return span.emphasis ? "addHighlight" : "add";
    default:
      return undefined;
  }
}

function formatSide(
  wrapped: WrappedLine | undefined,
  layout: SideBySideLayout,
  paint: Painter
) {
  const margin =
    wrapped?.line === undefined
      ? " ".repeat(layout.numberWidth + 1)
      : paint(
          `${String(wrapped.line).padStart(layout.numberWidth)}:`,
          "lineNumber"
        );
  const spans = wrapped?.spans ?? [];
  const tone = wrapped?.tone ?? "plain";
  const text = spans.map((span) => paint(span.text, spanStyle(tone, span)));
  return { margin, text: text.join(""), width: spanWidth(spans) };
}

function renderRow(row: Row, layout: SideBySideLayout, paint: Painter) {
  if (row.kind === "gap") {
    return [paint(gapLabel(row.hidden), "muted")];
  }
  const left = wrapCell(row.left, layout);
  const right = wrapCell(row.right, layout);
  const height = Math.max(left.length, right.length);
  const lines: string[] = [];
  for (let index = 0; index < height; index += 1) {
    const oldSide = formatSide(left[index], layout, paint);
    const newSide = formatSide(right[index], layout, paint);
    const padding = " ".repeat(Math.max(0, layout.column - oldSide.width));
    lines.push(
      `${oldSide.margin} ${oldSide.text}${padding}${SEPARATOR}` +
        `${newSide.margin} ${newSide.text}`
    );
  }
  return lines;
}

export function renderSideBySide(
  document: DiffDocument,
  layout: SideBySideLayout,
  paint: Painter
) {
  return document.blocks
    .flatMap(blockRows)
    .flatMap((row) => renderRow(row, layout, paint))
    .join("\n");
}
