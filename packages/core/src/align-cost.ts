import {
  type EditTokenKind,
  editTokens,
  toChars,
} from "./sequence-matcher.js";

/** Prices the moves of a line alignment. Both costs are non-negative. */
export interface LineCostModel {
  gap: (line: string) => number;
  substitution: (before: string, after: string) => number;
}

// Showing a line as a plain addition or removal costs its length; any pairing
// has to match or beat that.
export function gapCost(line: string) {
  return toChars(line).length;
}

/**
 * D × ⌈K / 2⌉, where D counts every non-equal token (hint markers included)
 * and K counts only insertions and deletions.
 */
export function tokenSubstitutionCost(tokens: readonly EditTokenKind[]) {
  let disruption = 0;
  let edits = 0;
  for (const token of tokens) {
    if (token === "equal") {
      continue;
    }
    disruption += 1;
    if (token === "insert" || token === "delete") {
      edits += 1;
    }
  }
  return disruption * Math.ceil(edits / 2);
}

export function substitutionCost(before: string, after: string) {
  return tokenSubstitutionCost(editTokens(before, after));
}

export const defaultLineCostModel: LineCostModel = {
  gap: gapCost,
  substitution: substitutionCost,
};
