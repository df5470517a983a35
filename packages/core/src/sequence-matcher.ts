export type OpcodeTag = "equal" | "insert" | "delete" | "replace";

/** A tagged pair of half-open ranges, one into each input. */
export interface Opcode {
  tag: OpcodeTag;
  oldStart: number;
  oldEnd: number;
  newStart: number;
  newEnd: number;
}

export type EditTokenKind = "equal" | "insert" | "delete" | "hint";

type Edit = "equal" | "delete" | "insert";

const MAX_LCS_CELLS = 2_000_000;

function buildLcsTable(
  oldValues: readonly string[],
  newValues: readonly string[]
) {
  const columns = newValues.length + 1;
  const table = new Uint32Array((oldValues.length + 1) * columns);
  for (let i = oldValues.length - 1; i >= 0; i -= 1) {
    for (let j = newValues.length - 1; j >= 0; j -= 1) {
      const cell = i * columns + j;
      if (oldValues[i] === newValues[j]) {
        table[cell] = (table[cell + columns + 1] ?? 0) + 1;
      } else {
        table[cell] = Math.max(
          table[cell + columns] ?? 0,
          table[cell + 1] ?? 0
        );
      }
    }
  }
  return table;
}

function lcsEdits(oldValues: readonly string[], newValues: readonly string[]) {
  const table = buildLcsTable(oldValues, newValues);
  const columns = newValues.length + 1;
  const edits: Edit[] = [];
  let i = 0;
  let j = 0;
  while (i < oldValues.length || j < newValues.length) {
    const hasOld = i < oldValues.length;
    const hasNew = j < newValues.length;
    if (hasOld && hasNew && oldValues[i] === newValues[j]) {
      edits.push("equal");
      i += 1;
      j += 1;
      continue;
    }
    const down = table[(i + 1) * columns + j] ?? 0;
    const right = table[i * columns + j + 1] ?? 0;
    if (!hasNew || (hasOld && down >= right)) {
      edits.push("delete");
      i += 1;
    } else {
      edits.push("insert");
      j += 1;
    }
  }
  return edits;
}

interface SplitPoint {
  x: number;
  y: number;
}

/**
 * Runs the forward and reverse greedy searches over the range pair until their
 * furthest-reaching paths overlap, and returns the overlap point. Diagonals
 * whose paths leave the edit grid are trimmed from later rounds.
 * Coordinates are range-relative.
 */
function middleSplit(
  oldValues: readonly string[],
  oldLo: number,
  oldCount: number,
  newValues: readonly string[],
  newLo: number,
  newCount: number
): SplitPoint {
  const max = Math.ceil((oldCount + newCount) / 2);
  const offset = max;
  const forward = new Int32Array(2 * max + 2).fill(-1);
  const reverse = new Int32Array(2 * max + 2).fill(-1);
  forward[offset + 1] = 0;
  reverse[offset + 1] = 0;
  const delta = oldCount - newCount;
  const odd = delta % 2 !== 0;
  let forwardStart = 0;
  let forwardEnd = 0;
  let reverseStart = 0;
  let reverseEnd = 0;

  for (let d = 0; d < max; d += 1) {
    for (let k = -d + forwardStart; k <= d - forwardEnd; k += 2) {
      const left = forward[offset + k - 1] ?? -1;
      const right = forward[offset + k + 1] ?? -1;
      let x = k === -d || (k !== d && left < right) ? right : left + 1;
      let y = x - k;
      while (
        x < oldCount &&
        y < newCount &&
        oldValues[oldLo + x] === newValues[newLo + y]
      ) {
        x += 1;
        y += 1;
      }
      forward[offset + k] = x;
      if (x > oldCount) {
        forwardEnd += 2;
      } else if (y > newCount) {
        forwardStart += 2;
      } else if (odd) {
        const reached = reverse[offset + delta - k] ?? -1;
        if (reached !== -1 && x >= oldCount - reached) {
          return { x, y };
        }
      }
    }

    for (let k = -d + reverseStart; k <= d - reverseEnd; k += 2) {
      const left = reverse[offset + k - 1] ?? -1;
      const right = reverse[offset + k + 1] ?? -1;
      let x = k === -d || (k !== d && left < right) ? right : left + 1;
      let y = x - k;
      while (
        x < oldCount &&
        y < newCount &&
        oldValues[oldLo + oldCount - 1 - x] ===
          newValues[newLo + newCount - 1 - y]
      ) {
        x += 1;
        y += 1;
      }
      reverse[offset + k] = x;
      if (x > oldCount) {
        reverseEnd += 2;
      } else if (y > newCount) {
        reverseStart += 2;
      } else if (!odd) {
        const forwardK = delta - k;
        const reached = forward[offset + forwardK] ?? -1;
        if (reached !== -1 && reached >= oldCount - x) {
          return { x: reached, y: reached - forwardK };
        }
      }
    }
  }

  // Nothing in common: delete everything, then insert everything.
  return { x: oldCount, y: 0 };
}

function pushRepeated(edits: Edit[], edit: Edit, count: number) {
  for (let index = 0; index < count; index += 1) {
    edits.push(edit);
  }
}

function myersRange(
  oldValues: readonly string[],
  oldStart: number,
  oldEnd: number,
  newValues: readonly string[],
  newStart: number,
  newEnd: number,
  edits: Edit[]
) {
  let oldLo = oldStart;
  let newLo = newStart;
  let oldHi = oldEnd;
  let newHi = newEnd;
  while (
    oldLo < oldHi &&
    newLo < newHi &&
    oldValues[oldLo] === newValues[newLo]
  ) {
    edits.push("equal");
    oldLo += 1;
    newLo += 1;
  }
  let suffix = 0;
  while (
    oldHi > oldLo &&
    newHi > newLo &&
    oldValues[oldHi - 1] === newValues[newHi - 1]
  ) {
    oldHi -= 1;
    newHi -= 1;
    suffix += 1;
  }

  const oldCount = oldHi - oldLo;
  const newCount = newHi - newLo;
  if (oldCount === 0) {
    pushRepeated(edits, "insert", newCount);
  } else if (newCount === 0) {
    pushRepeated(edits, "delete", oldCount);
  } else {
    // Both sides differ at their ends, so the split point is never a corner
    // and each half is strictly smaller.
    const split = middleSplit(
      oldValues,
      oldLo,
      oldCount,
      newValues,
      newLo,
      newCount
    );
    myersRange(
      oldValues,
      oldLo,
      oldLo + split.x,
      newValues,
      newLo,
      newLo + split.y,
      edits
    );
    myersRange(
      oldValues,
      oldLo + split.x,
      oldHi,
      newValues,
      newLo + split.y,
      newHi,
      edits
    );
  }

  pushRepeated(edits, "equal", suffix);
}

/** Linear-space Myers: recurses on middle splits instead of keeping a trace. */
function myersEdits(
  oldValues: readonly string[],
  newValues: readonly string[]
) {
  const edits: Edit[] = [];
  myersRange(
    oldValues,
    0,
    oldValues.length,
    newValues,
    0,
    newValues.length,
    edits
  );
  return edits;
}

function editScript(
  oldValues: readonly string[],
  newValues: readonly string[]
) {
  if (oldValues.length * newValues.length > MAX_LCS_CELLS) {
    return myersEdits(oldValues, newValues);
  }
  return lcsEdits(oldValues, newValues);
}

function groupEdits(edits: readonly Edit[]): Opcode[] {
  const opcodes: Opcode[] = [];
  let oldIndex = 0;
  let newIndex = 0;
  let cursor = 0;

  while (cursor < edits.length) {
    const oldStart = oldIndex;
    const newStart = newIndex;
    if (edits[cursor] === "equal") {
      while (edits[cursor] === "equal") {
        oldIndex += 1;
        newIndex += 1;
        cursor += 1;
      }
      opcodes.push({
        tag: "equal",
        oldStart,
        oldEnd: oldIndex,
        newStart,
        newEnd: newIndex,
      });
      continue;
    }
    while (cursor < edits.length && edits[cursor] !== "equal") {
      if (edits[cursor] === "delete") {
        oldIndex += 1;
      } else {
        newIndex += 1;
      }
      cursor += 1;
    }
    let tag: OpcodeTag = "replace";
    if (oldIndex === oldStart) {
      tag = "insert";
    } else if (newIndex === newStart) {
      tag = "delete";
    }
    opcodes.push({
      tag,
      oldStart,
      oldEnd: oldIndex,
      newStart,
      newEnd: newIndex,
    });
  }

  return opcodes;
}

/**
 * Partitions both inputs into equal, insert, delete and replace runs using a
 * minimal edit script (LCS table, or Myers for large inputs).
 */
export function matchSequences(
  oldValues: readonly string[],
  newValues: readonly string[]
): Opcode[] {
  return groupEdits(editScript(oldValues, newValues));
}

/** Splits a string into code points. */
export function toChars(text: string): string[] {
  return Array.from(text);
}

export function matchChars(before: string, after: string): Opcode[] {
  return matchSequences(toChars(before), toChars(after));
}

/**
 * Expands a character-level match into one token per touched character.
 * Replacements list their deletions before their insertions.
 */
export function editTokens(before: string, after: string): EditTokenKind[] {
  const tokens: EditTokenKind[] = [];
  const push = (kind: EditTokenKind, count: number) => {
    for (let index = 0; index < count; index += 1) {
      tokens.push(kind);
    }
  };
  for (const opcode of matchChars(before, after)) {
    const oldCount = opcode.oldEnd - opcode.oldStart;
    const newCount = opcode.newEnd - opcode.newStart;
    switch (opcode.tag) {
      case "equal":
        push("equal", oldCount);
        break;
      case "delete":
        push("delete", oldCount);
        break;
      case "insert":
        push("insert", newCount);
        break;
      case "replace":
        push("delete", oldCount);
        push("insert", newCount);
        break;
      default:
        break;
    }
  }
  return tokens;
}
