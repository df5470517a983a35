import { solveAlignment } from "./align.js";
import {
  DEFAULT_MAX_ALIGNMENT_CELLS,
  type DiffDocumentOptions,
} from "./diff-document.js";
import { splitLines } from "./lines.js";
import { matchSequences } from "./sequence-matcher.js";

export interface ExplainPair {
  kind: "substitute" | "delete" | "insert";
  before?: string;
  after?: string;
  cost?: number;
  distance?: number;
}

export interface ExplainBlock {
  oldStart: number;
  newStart: number;
  oldLines: number;
  newLines: number;
  aligned: boolean;
  cost?: number;
  baselineCost?: number;
  pairs: ExplainPair[];
}

export interface ExplainDocument {
  version: "0.1.0";
  blocks: ExplainBlock[];
}

export interface ExplainOptions
  extends Pick<DiffDocumentOptions, "maxAlignmentCells" | "costModel"> {
  /** Adds each move's cost and running path distance. */
  verbose?: boolean;
}

function explainBlock(
  oldLines: readonly string[],
  newLines: readonly string[],
  oldStart: number,
  newStart: number,
  options: ExplainOptions
): ExplainBlock {
  const base = {
    oldStart,
    newStart,
    oldLines: oldLines.length,
    newLines: newLines.length,
  };
  const maxCells = options.maxAlignmentCells ?? DEFAULT_MAX_ALIGNMENT_CELLS;
  if (oldLines.length * newLines.length > maxCells) {
    return { ...base, aligned: false, pairs: [] };
  }
  const alignment = solveAlignment(
    oldLines,
    newLines,
    options.costModel ? { costModel: options.costModel } : {}
  );
  const pairs = alignment.pairs.map((pair): ExplainPair => {
    const sides: ExplainPair = {
      kind: pair.kind,
      ...(pair.before !== undefined ? { before: pair.before } : {}),
      ...(pair.after !== undefined ? { after: pair.after } : {}),
    };
    if (!options.verbose) {
      return sides;
    }
    return { ...sides, cost: pair.cost, distance: pair.distance };
  });
  return {
    ...base,
    aligned: true,
    cost: alignment.cost,
    baselineCost: alignment.baselineCost,
    pairs,
  };
}

/** Reports how every replace block between the two texts was aligned. */
export function explainDiff(
  oldText: string,
  newText: string,
  options: ExplainOptions = {}
): ExplainDocument {
  const oldLines = splitLines(oldText);
  const newLines = splitLines(newText);
  const blocks = matchSequences(oldLines, newLines)
    .filter((opcode) => opcode.tag === "replace")
    .map((opcode) =>
      explainBlock(
        oldLines.slice(opcode.oldStart, opcode.oldEnd),
        newLines.slice(opcode.newStart, opcode.newEnd),
        opcode.oldStart + 1,
        opcode.newStart + 1,
        options
      )
    );
  return { version: "0.1.0", blocks };
}
