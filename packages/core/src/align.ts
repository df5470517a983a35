import type { LineCostModel } from "./align-cost.js";
import { defaultLineCostModel } from "./align-cost.js";
import { AlignmentLattice } from "./align-lattice.js";
import { type SolvedLattice, solveLattice, walkPath } from "./align-solver.js";

interface PairCost {
  /** Intrinsic weight of the move. */
  cost: number;
  /** Total path cost up to and including the move. */
  distance: number;
}

export interface SubstitutePair extends PairCost {
  kind: "substitute";
  before: string;
  after: string;
  beforeIndex: number;
  afterIndex: number;
}

export interface DeletePair extends PairCost {
  kind: "delete";
  before: string;
  after?: undefined;
  beforeIndex: number;
}

export interface InsertPair extends PairCost {
  kind: "insert";
  before?: undefined;
  after: string;
  afterIndex: number;
}

export type AlignedPair = SubstitutePair | DeletePair | InsertPair;

export interface AlignOptions {
  costModel?: LineCostModel;
}

export interface LineAlignment {
  pairs: AlignedPair[];
  cost: number;
  /** Cost of leaving every line unpaired. */
  baselineCost: number;
}

function decodePairs(solved: SolvedLattice): AlignedPair[] {
  const { lattice, distances } = solved;
  return walkPath(solved).map((index): AlignedPair => {
    const node = lattice.node(index);
    const cost = lattice.weight(index);
    const distance = distances[index] ?? cost;
    const beforeIndex = node.i - 1;
    const afterIndex = node.j - 1;
    switch (node.kind) {
      case "delete":
        return {
          kind: "delete",
          before: lattice.before[beforeIndex] ?? "",
          beforeIndex,
          cost,
          distance,
        };
      case "insert":
        return {
          kind: "insert",
          after: lattice.after[afterIndex] ?? "",
          afterIndex,
          cost,
          distance,
        };
      default:
        return {
          kind: "substitute",
          before: lattice.before[beforeIndex] ?? "",
          after: lattice.after[afterIndex] ?? "",
          beforeIndex,
          afterIndex,
          cost,
          distance,
        };
    }
  });
}

/**
 * Pairs the lines of a replace block so that the total cost of the chosen
 * substitutions and gaps is minimal. Throws `EmptyReplaceBlockError` when
 * both sides are empty.
 */
export function solveAlignment(
  before: readonly string[],
  after: readonly string[],
  options: AlignOptions = {}
): LineAlignment {
  const costModel = options.costModel ?? defaultLineCostModel;
  const solved = solveLattice(new AlignmentLattice(before, after, costModel));
  const baselineCost =
    before.reduce((sum, line) => sum + costModel.gap(line), 0) +
    after.reduce((sum, line) => sum + costModel.gap(line), 0);
  return {
    pairs: decodePairs(solved),
    cost: solved.cost,
    baselineCost,
  };
}

export function alignLines(
  before: readonly string[],
  after: readonly string[],
  options: AlignOptions = {}
): AlignedPair[] {
  return solveAlignment(before, after, options).pairs;
}
