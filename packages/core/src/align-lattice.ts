import { defaultLineCostModel, type LineCostModel } from "./align-cost.js";
import { EmptyReplaceBlockError } from "./errors.js";

export type MoveKind = "delete" | "insert" | "substitute";

/**
 * A move, addressed by the consumption state it lands on: `i` before-lines
 * and `j` after-lines consumed once the move is taken.
 */
export interface LatticeNode {
  kind: MoveKind;
  i: number;
  j: number;
}

const SLOTS = 3;
const KIND_SLOT: Record<MoveKind, number> = {
  delete: 0,
  insert: 1,
  substitute: 2,
};
const SLOT_KIND: readonly MoveKind[] = ["delete", "insert", "substitute"];

/**
 * Moves leaving a state, in relaxation order: advance before only, advance
 * after only, advance both.
 */
export const OUTGOING_MOVES: readonly MoveKind[] = [
  "delete",
  "insert",
  "substitute",
];

export function landingState(i: number, j: number, kind: MoveKind) {
  return {
    i: kind === "insert" ? i : i + 1,
    j: kind === "delete" ? j : j + 1,
  };
}

/**
 * The (m+1)×(n+1) grid of consumption states with up to three incoming move
 * nodes per state. Weights are fixed at construction; the origin (0,0) has
 * no incoming node.
 */
export class AlignmentLattice {
  readonly rows: number;
  readonly columns: number;
  private readonly weights: Float64Array;

  constructor(
    readonly before: readonly string[],
    readonly after: readonly string[],
    costModel: LineCostModel = defaultLineCostModel
  ) {
    if (before.length === 0 && after.length === 0) {
      throw new EmptyReplaceBlockError({
        message: "Cannot align a replace block with no lines on either side",
      });
    }
    this.rows = before.length;
    this.columns = after.length;
    this.weights = new Float64Array(
      (this.rows + 1) * (this.columns + 1) * SLOTS
    );

    const beforeGaps = before.map((line) => costModel.gap(line));
    const afterGaps = after.map((line) => costModel.gap(line));

    for (let i = 0; i <= this.rows; i += 1) {
      for (let j = 0; j <= this.columns; j += 1) {
        const beforeLine = before[i - 1];
        const afterLine = after[j - 1];
        if (beforeLine !== undefined) {
          this.weights[this.index(i, j, "delete")] = beforeGaps[i - 1] ?? 0;
        }
        if (afterLine !== undefined) {
          this.weights[this.index(i, j, "insert")] = afterGaps[j - 1] ?? 0;
        }
        if (beforeLine !== undefined && afterLine !== undefined) {
          this.weights[this.index(i, j, "substitute")] =
            costModel.substitution(beforeLine, afterLine);
        }
      }
    }
  }

  /** Materialized nodes: 3·m·n + m + n. */
  get nodeCount() {
    return 3 * this.rows * this.columns + this.rows + this.columns;
  }

  get slotCount() {
    return this.weights.length;
  }

  has(i: number, j: number, kind: MoveKind) {
    if (i < 0 || j < 0 || i > this.rows || j > this.columns) {
      return false;
    }
    switch (kind) {
      case "delete":
        return i > 0;
      case "insert":
        return j > 0;
      case "substitute":
        return i > 0 && j > 0;
      default:
        return false;
    }
  }

  index(i: number, j: number, kind: MoveKind) {
    return (i * (this.columns + 1) + j) * SLOTS + KIND_SLOT[kind];
  }

  node(index: number): LatticeNode {
    const state = Math.floor(index / SLOTS);
    const kind = SLOT_KIND[index % SLOTS] ?? "substitute";
    return {
      kind,
      i: Math.floor(state / (this.columns + 1)),
      j: state % (this.columns + 1),
    };
  }

  weight(index: number) {
    return this.weights[index] ?? Number.POSITIVE_INFINITY;
  }

  /** Indices of the nodes reachable by one move out of state (i, j). */
  successors(i: number, j: number) {
    const targets: number[] = [];
    for (const kind of OUTGOING_MOVES) {
      const landing = landingState(i, j, kind);
      if (this.has(landing.i, landing.j, kind)) {
        targets.push(this.index(landing.i, landing.j, kind));
      }
    }
    return targets;
  }
}
