import type { AlignmentLattice, MoveKind } from "./align-lattice.js";

/** Predecessor marker for nodes reached directly from the origin state. */
export const ORIGIN = -1;

// Nodes landing on the same state relax their successors in this order, so
// ties between them resolve toward the earlier kind.
const LANDING_ORDER: readonly MoveKind[] = ["substitute", "delete", "insert"];

export interface SolvedLattice {
  lattice: AlignmentLattice;
  distances: Float64Array;
  predecessors: Int32Array;
  terminal: number;
  cost: number;
}

function selectTerminal(
  lattice: AlignmentLattice,
  distances: Float64Array
): number {
  const { rows: m, columns: n } = lattice;
  const distanceOf = (kind: MoveKind) =>
    lattice.has(m, n, kind)
      ? (distances[lattice.index(m, n, kind)] ?? Number.POSITIVE_INFINITY)
      : Number.POSITIVE_INFINITY;

  const deleteLast = distanceOf("delete");
  const insertLast = distanceOf("insert");
  const substituteLast = distanceOf("substitute");

  if (deleteLast < insertLast && deleteLast < substituteLast) {
    return lattice.index(m, n, "delete");
  }
  if (insertLast < substituteLast) {
    return lattice.index(m, n, "insert");
  }
  return lattice.index(m, n, "substitute");
}

/**
 * Single-source shortest path over the lattice. States are swept row-major,
 * which visits every node after all of its predecessors, so each edge is
 * relaxed exactly once.
 */
export function solveLattice(lattice: AlignmentLattice): SolvedLattice {
  const distances = new Float64Array(lattice.slotCount).fill(
    Number.POSITIVE_INFINITY
  );
  const predecessors = new Int32Array(lattice.slotCount).fill(ORIGIN);

  const relaxFrom = (
    source: number,
    sourceDistance: number,
    i: number,
    j: number
  ) => {
    for (const target of lattice.successors(i, j)) {
      const candidate = sourceDistance + lattice.weight(target);
      if ((distances[target] ?? Number.POSITIVE_INFINITY) > candidate) {
        distances[target] = candidate;
        predecessors[target] = source;
      }
    }
  };

  relaxFrom(ORIGIN, 0, 0, 0);
  for (let i = 0; i <= lattice.rows; i += 1) {
    for (let j = 0; j <= lattice.columns; j += 1) {
      for (const kind of LANDING_ORDER) {
        if (!lattice.has(i, j, kind)) {
          continue;
        }
        const source = lattice.index(i, j, kind);
        relaxFrom(source, distances[source] ?? 0, i, j);
      }
    }
  }

  const terminal = selectTerminal(lattice, distances);
  return {
    lattice,
    distances,
    predecessors,
    terminal,
    cost: distances[terminal] ?? Number.POSITIVE_INFINITY,
  };
}

/** Node indices from the first move after the origin to the terminal. */
export function walkPath(solved: SolvedLattice): number[] {
  const path: number[] = [];
  for (
    let cursor = solved.terminal;
    cursor !== ORIGIN;
    cursor = solved.predecessors[cursor] ?? ORIGIN
  ) {
    path.push(cursor);
  }
  return path.reverse();
}
