import { solveAlignment } from "./align.js";
import type { LineCostModel } from "./align-cost.js";
import type {
  CharSegment,
  DiffBlock,
  DiffDocument,
  ReplaceRow,
} from "./diff-schema.js";
import { splitLines } from "./lines.js";
import { matchSequences, toChars } from "./sequence-matcher.js";

export const DEFAULT_MAX_ALIGNMENT_CELLS = 10_000;

export interface DiffDocumentOptions {
  /** Equal lines kept around each change; unset keeps every line. */
  context?: number;
  /** Replace blocks with more line pairs than this render unaligned. */
  maxAlignmentCells?: number;
  costModel?: LineCostModel;
}

type EqualPosition = "leading" | "trailing" | "interior" | "only";

function pushSegment(
  segments: CharSegment[],
  type: CharSegment["type"],
  text: string
) {
  if (text.length === 0) {
    return;
  }
  const last = segments.at(-1);
  if (last && last.type === type) {
    segments[segments.length - 1] = { type, text: last.text + text };
    return;
  }
  segments.push({ type, text });
}

export function charSegments(before: string, after: string) {
  const oldChars = toChars(before);
  const newChars = toChars(after);
  const oldSegments: CharSegment[] = [];
  const newSegments: CharSegment[] = [];

  for (const opcode of matchSequences(oldChars, newChars)) {
    const oldText = oldChars.slice(opcode.oldStart, opcode.oldEnd).join("");
    const newText = newChars.slice(opcode.newStart, opcode.newEnd).join("");
    if (opcode.tag === "equal") {
      pushSegment(oldSegments, "equal", oldText);
      pushSegment(newSegments, "equal", newText);
      continue;
    }
    pushSegment(oldSegments, "delete", oldText);
    pushSegment(newSegments, "insert", newText);
  }

  return { oldSegments, newSegments };
}

function unalignedRows(
  oldLines: readonly string[],
  newLines: readonly string[],
  oldStart: number,
  newStart: number
): ReplaceRow[] {
  return [
    ...oldLines.map(
      (oldText, index): ReplaceRow => ({
        type: "delete",
        oldLine: oldStart + index,
        oldText,
      })
    ),
    ...newLines.map(
      (newText, index): ReplaceRow => ({
        type: "insert",
        newLine: newStart + index,
        newText,
      })
    ),
  ];
}

function alignedRows(
  oldLines: readonly string[],
  newLines: readonly string[],
  oldStart: number,
  newStart: number,
  costModel: LineCostModel | undefined
): ReplaceRow[] {
  const alignment = solveAlignment(
    oldLines,
    newLines,
    costModel ? { costModel } : {}
  );
  return alignment.pairs.map((pair): ReplaceRow => {
    switch (pair.kind) {
      case "delete":
        return {
          type: "delete",
          oldLine: oldStart + pair.beforeIndex,
          oldText: pair.before,
        };
      case "insert":
        return {
          type: "insert",
          newLine: newStart + pair.afterIndex,
          newText: pair.after,
        };
      default:
        return {
          type: "pair",
          oldLine: oldStart + pair.beforeIndex,
          newLine: newStart + pair.afterIndex,
          oldText: pair.before,
          newText: pair.after,
          ...charSegments(pair.before, pair.after),
        };
    }
  });
}

export function buildReplaceBlock(
  oldLines: readonly string[],
  newLines: readonly string[],
  oldStart: number,
  newStart: number,
  options: DiffDocumentOptions = {}
): DiffBlock {
  const maxCells = options.maxAlignmentCells ?? DEFAULT_MAX_ALIGNMENT_CELLS;
  if (oldLines.length * newLines.length > maxCells) {
    return {
      type: "replace",
      aligned: false,
      rows: unalignedRows(oldLines, newLines, oldStart, newStart),
    };
  }
  return {
    type: "replace",
    aligned: true,
    rows: alignedRows(
      oldLines,
      newLines,
      oldStart,
      newStart,
      options.costModel
    ),
  };
}

function keptLines(position: EqualPosition, context: number) {
  switch (position) {
    case "leading":
      return { head: 0, tail: context };
    case "trailing":
      return { head: context, tail: 0 };
    case "interior":
      return { head: context, tail: context };
    default:
      return { head: 0, tail: 0 };
  }
}

function equalBlocks(
  lines: readonly string[],
  oldStart: number,
  newStart: number,
  position: EqualPosition,
  context: number | undefined
): DiffBlock[] {
  // Zero context means no folding at all.
  if (context === undefined || context <= 0) {
    return [{ type: "equal", oldStart, newStart, lines }];
  }
  const { head, tail } = keptLines(position, context);
  if (head + tail >= lines.length) {
    return [{ type: "equal", oldStart, newStart, lines }];
  }
  const hidden = lines.length - head - tail;
  const blocks: DiffBlock[] = [];
  if (head > 0) {
    blocks.push({
      type: "equal",
      oldStart,
      newStart,
      lines: lines.slice(0, head),
    });
  }
  blocks.push({ type: "gap", hidden });
  if (tail > 0) {
    blocks.push({
      type: "equal",
      oldStart: oldStart + head + hidden,
      newStart: newStart + head + hidden,
      lines: lines.slice(head + hidden),
    });
  }
  return blocks;
}

function equalPosition(index: number, count: number): EqualPosition {
  const first = index === 0;
  const last = index === count - 1;
  if (first && last) {
    return "only";
  }
  if (first) {
    return "leading";
  }
  if (last) {
    return "trailing";
  }
  return "interior";
}

/**
 * Line-level diff of two texts in which every replace block is aligned line
 * by line and each aligned pair carries its character-level segments.
 */
export function buildDiffDocument(
  oldText: string,
  newText: string,
  options: DiffDocumentOptions = {}
): DiffDocument {
  const oldLines = splitLines(oldText);
  const newLines = splitLines(newText);
  const opcodes = matchSequences(oldLines, newLines);
  const blocks: DiffBlock[] = [];

  opcodes.forEach((opcode, index) => {
    const oldSlice = oldLines.slice(opcode.oldStart, opcode.oldEnd);
    const newSlice = newLines.slice(opcode.newStart, opcode.newEnd);
    const oldStart = opcode.oldStart + 1;
    const newStart = opcode.newStart + 1;
    switch (opcode.tag) {
      case "equal":
        blocks.push(
          ...equalBlocks(
            oldSlice,
            oldStart,
            newStart,
            equalPosition(index, opcodes.length),
            options.context
          )
        );
        break;
      case "delete":
        blocks.push({ type: "delete", oldStart, lines: oldSlice });
        break;
      case "insert":
        blocks.push({ type: "insert", newStart, lines: newSlice });
        break;
      default:
        blocks.push(
          buildReplaceBlock(oldSlice, newSlice, oldStart, newStart, options)
        );
        break;
    }
  });

  return {
    version: "0.1.0",
    oldLineCount: oldLines.length,
    newLineCount: newLines.length,
    blocks,
  };
}
