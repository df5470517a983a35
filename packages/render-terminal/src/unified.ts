import type { CharSegment, DiffBlock, ReplaceRow } from "@lineweave/core";
import type { Painter } from "./styles.js";

export function gapLabel(hidden: number) {
  const label = hidden === 1 ? "1 line hidden" : `${hidden} lines hidden`;
  return `… ${label} …`;
}

function pairedLine(
  prefix: string,
  segments: readonly CharSegment[],
  side: "remove" | "add",
  paint: Painter
) {
  const highlight = side === "remove" ? "removeHighlight" : "addHighlight";
  const body = segments
    .map((segment) =>
      paint(segment.text, segment.type === "equal" ? side : highlight)
    )
    .join("");
  return `${paint(prefix, side)}${body}`;
}

function oldSide(row: ReplaceRow, paint: Painter) {
  switch (row.type) {
    case "pair":
      return [pairedLine("- ", row.oldSegments, "remove", paint)];
    case "delete":
      return [
        `${paint("- ", "remove")}${paint(row.oldText, "removeHighlight")}`,
      ];
    default:
      return [];
  }
}

function newSide(row: ReplaceRow, paint: Painter) {
  switch (row.type) {
    case "pair":
      return [pairedLine("+ ", row.newSegments, "add", paint)];
    case "insert":
      return [`${paint("+ ", "add")}${paint(row.newText, "addHighlight")}`];
    default:
      return [];
  }
}

function blockLines(block: DiffBlock, paint: Painter): string[] {
  switch (block.type) {
    case "equal":
      return block.lines.map((line) => `  ${line}`);
    case "gap":
      return [paint(gapLabel(block.hidden), "muted")];
    case "delete":
      return block.lines.map((line) => paint(`- ${line}`, "remove"));
    case "insert":
      return block.lines.map((line) => paint(`+ ${line}`, "add"));
    default:
      return [
        ...block.rows.flatMap((row) => oldSide(row, paint)),
        ...block.rows.flatMap((row) => newSide(row, paint)),
      ];
  }
}

export function renderUnified(blocks: readonly DiffBlock[], paint: Painter) {
  return blocks.flatMap((block) => blockLines(block, paint)).join("\n");
}
