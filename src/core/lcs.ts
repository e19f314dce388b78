/**
 * Sequence alignment for document comparison
 *
 * Three algorithms live here:
 *
 * - `alignSequences` is a Myers O(N·D) diff over hashed units. It decides
 *   which lines correspond between two versions of a text and is the basis
 *   for `computeOpcodes`.
 * - `alignWithPairing` aligns blocks and table rows. Besides exact matches
 *   it pairs unequal items of the same group, and it gives the same
 *   alignment, mirrored, when the two inputs are swapped.
 * - `computeCorrelation` finds the longest common contiguous run, then
 *   recurses on both sides of it. It is used to score similarity and to
 *   build word-level segments, where contiguous runs read better than a
 *   minimal edit script.
 */

/**
 * Correlation status indicating how content relates between documents
 */
export enum CorrelationStatus {
  /** Content appears in both documents at this position */
  Equal = 'Equal',
  /** Content was deleted from the original document */
  Deleted = 'Deleted',
  /** Content was inserted in the revised document */
  Inserted = 'Inserted',
}

/**
 * Items must have a hash property for equality comparison
 */
export interface Hashable {
  hash: string;
}

/**
 * A correlated sequence showing how portions of two arrays relate
 */
export interface CorrelatedSequence<T extends Hashable> {
  status: CorrelationStatus;
  /** Items from the first (original) array, null if inserted */
  items1: T[] | null;
  /** Items from the second (revised) array, null if deleted */
  items2: T[] | null;
}

export type OpcodeTag = 'equal' | 'insert' | 'delete' | 'replace';

/**
 * One alignment operation. Ranges are half-open: items1[i1, i2) against items2[j1, j2).
 */
export interface Opcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

/**
 * Find the longest common contiguous subsequence between two arrays.
 *
 * Ties go to the earliest position in items1, then in items2.
 *
 * @returns Object with start indices and length, or null if no match found
 */
export function findLongestMatch<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[]
): { i1: number; i2: number; length: number } | null {
  let bestLength = 0;
  let bestI1 = -1;
  let bestI2 = -1;

  // Don't search positions where we can't possibly find
  // a longer match than what we already have
  for (let i1 = 0; i1 < items1.length - bestLength; i1++) {
    for (let i2 = 0; i2 < items2.length - bestLength; i2++) {
      let matchLength = 0;
      let curI1 = i1;
      let curI2 = i2;

      while (
        curI1 < items1.length &&
        curI2 < items2.length &&
        items1[curI1].hash === items2[curI2].hash
      ) {
        matchLength++;
        curI1++;
        curI2++;
      }

      if (matchLength > bestLength) {
        bestLength = matchLength;
        bestI1 = i1;
        bestI2 = i2;
      }
    }
  }

  if (bestLength === 0) {
    return null;
  }

  return { i1: bestI1, i2: bestI2, length: bestLength };
}

/**
 * Compute the longest-match correlation between two arrays.
 *
 * Recursively finds matches and builds a list of correlated sequences
 * showing which parts are equal, deleted, or inserted.
 */
export function computeCorrelation<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[]
): CorrelatedSequence<T>[] {
  if (items1.length === 0 && items2.length === 0) {
    return [];
  }

  if (items1.length === 0) {
    return [{ status: CorrelationStatus.Inserted, items1: null, items2: [...items2] }];
  }

  if (items2.length === 0) {
    return [{ status: CorrelationStatus.Deleted, items1: [...items1], items2: null }];
  }

  const match = findLongestMatch(items1, items2);

  // No match found - everything is different
  if (!match) {
    return [
      { status: CorrelationStatus.Deleted, items1: [...items1], items2: null },
      { status: CorrelationStatus.Inserted, items1: null, items2: [...items2] },
    ];
  }

  const result: CorrelatedSequence<T>[] = [];

  if (match.i1 > 0 || match.i2 > 0) {
    result.push(
      ...computeCorrelation(items1.slice(0, match.i1), items2.slice(0, match.i2))
    );
  }

  result.push({
    status: CorrelationStatus.Equal,
    items1: items1.slice(match.i1, match.i1 + match.length),
    items2: items2.slice(match.i2, match.i2 + match.length),
  });

  const afterI1 = match.i1 + match.length;
  const afterI2 = match.i2 + match.length;
  if (afterI1 < items1.length || afterI2 < items2.length) {
    result.push(...computeCorrelation(items1.slice(afterI1), items2.slice(afterI2)));
  }

  return result;
}

/**
 * Count the items covered by Equal sequences of a correlation
 */
export function countMatchedItems<T extends Hashable>(
  sequences: readonly CorrelatedSequence<T>[]
): number {
  let matched = 0;
  for (const seq of sequences) {
    if (seq.status === CorrelationStatus.Equal && seq.items1) {
      matched += seq.items1.length;
    }
  }
  return matched;
}

/**
 * Flatten a list of correlated sequences, merging adjacent sequences
 * of the same status.
 */
export function flattenCorrelation<T extends Hashable>(
  sequences: readonly CorrelatedSequence<T>[]
): CorrelatedSequence<T>[] {
  if (sequences.length === 0) return [];

  const result: CorrelatedSequence<T>[] = [];
  let current = { ...sequences[0] };

  for (let i = 1; i < sequences.length; i++) {
    const next = sequences[i];

    if (next.status === current.status) {
      if (current.items1 && next.items1) {
        current.items1 = [...current.items1, ...next.items1];
      }
      if (current.items2 && next.items2) {
        current.items2 = [...current.items2, ...next.items2];
      }
    } else {
      result.push(current);
      current = { ...next };
    }
  }

  result.push(current);
  return result;
}

type EditStep = { op: 'equal'; i: number; j: number } | { op: 'delete'; i: number } | { op: 'insert'; j: number };

/**
 * Align two arrays with the Myers greedy diff.
 *
 * Each diagonal is extended through the longest snake from its furthest
 * point, so matches are taken as early as possible. Within a gap, all
 * deletions are reported before the insertions.
 */
export function alignSequences<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[]
): CorrelatedSequence<T>[] {
  const steps = myersEditScript(items1, items2);
  const result: CorrelatedSequence<T>[] = [];

  let equal: { items1: T[]; items2: T[] } | null = null;
  let deleted: T[] = [];
  let inserted: T[] = [];

  const flushGap = (): void => {
    if (deleted.length > 0) {
      result.push({ status: CorrelationStatus.Deleted, items1: deleted, items2: null });
      deleted = [];
    }
    if (inserted.length > 0) {
      result.push({ status: CorrelationStatus.Inserted, items1: null, items2: inserted });
      inserted = [];
    }
  };

  for (const step of steps) {
    if (step.op === 'equal') {
      flushGap();
      if (!equal) {
        equal = { items1: [], items2: [] };
      }
      equal.items1.push(items1[step.i]);
      equal.items2.push(items2[step.j]);
      continue;
    }

    if (equal) {
      result.push({ status: CorrelationStatus.Equal, ...equal });
      equal = null;
    }
    if (step.op === 'delete') {
      deleted.push(items1[step.i]);
    } else {
      inserted.push(items2[step.j]);
    }
  }

  if (equal) {
    result.push({ status: CorrelationStatus.Equal, ...equal });
  }
  flushGap();

  return result;
}

/**
 * Compute alignment opcodes between two arrays.
 *
 * A gap holding both deletions and insertions becomes a single `replace`.
 */
export function computeOpcodes<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[]
): Opcode[] {
  const opcodes: Opcode[] = [];
  let i = 0;
  let j = 0;
  let gapI = 0;
  let gapJ = 0;

  const flushGap = (): void => {
    if (i > gapI && j > gapJ) {
      opcodes.push({ tag: 'replace', i1: gapI, i2: i, j1: gapJ, j2: j });
    } else if (i > gapI) {
      opcodes.push({ tag: 'delete', i1: gapI, i2: i, j1: gapJ, j2: gapJ });
    } else if (j > gapJ) {
      opcodes.push({ tag: 'insert', i1: gapI, i2: gapI, j1: gapJ, j2: j });
    }
  };

  for (const seq of alignSequences(items1, items2)) {
    if (seq.status === CorrelationStatus.Equal && seq.items1) {
      flushGap();
      const length = seq.items1.length;
      opcodes.push({ tag: 'equal', i1: i, i2: i + length, j1: j, j2: j + length });
      i += length;
      j += length;
      gapI = i;
      gapJ = j;
    } else if (seq.status === CorrelationStatus.Deleted && seq.items1) {
      i += seq.items1.length;
    } else if (seq.status === CorrelationStatus.Inserted && seq.items2) {
      j += seq.items2.length;
    }
  }
  flushGap();

  return opcodes;
}

/**
 * Shortest edit script between two arrays (Myers, "An O(ND) Difference
 * Algorithm and Its Variations", 1986), recovered by backtracking through
 * the saved frontier of every edit distance. Only diagonals -d-1..d+1 are
 * saved for distance d.
 */
function myersEditScript<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[]
): EditStep[] {
  const n = items1.length;
  const m = items2.length;
  const max = n + m;
  const offset = max + 1;
  const frontier = new Int32Array(2 * max + 3);
  const trace: Int32Array[] = [];

  search: for (let d = 0; d <= max; d++) {
    trace.push(frontier.slice(offset - d - 1, offset + d + 2));
    for (let k = -d; k <= d; k += 2) {
      let x: number;
      if (k === -d || (k !== d && frontier[offset + k - 1] < frontier[offset + k + 1])) {
        x = frontier[offset + k + 1];
      } else {
        x = frontier[offset + k - 1] + 1;
      }
      let y = x - k;
      while (x < n && y < m && items1[x].hash === items2[y].hash) {
        x++;
        y++;
      }
      frontier[offset + k] = x;
      if (x >= n && y >= m) {
        break search;
      }
    }
  }

  const reversed: EditStep[] = [];
  let x = n;
  let y = m;

  for (let d = trace.length - 1; d >= 0; d--) {
    // trace[d][0] holds diagonal -d-1
    const v = trace[d];
    const base = d + 1;
    const k = x - y;
    const prevK =
      k === -d || (k !== d && v[base + k - 1] < v[base + k + 1]) ? k + 1 : k - 1;
    const prevX = v[base + prevK];
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      x--;
      y--;
      reversed.push({ op: 'equal', i: x, j: y });
    }

    if (d > 0) {
      if (x === prevX) {
        reversed.push({ op: 'insert', j: prevY });
      } else {
        reversed.push({ op: 'delete', i: prevX });
      }
    }

    x = prevX;
    y = prevY;
  }

  return reversed.reverse();
}

// ============================================================================
// Alignment with pairing
// ============================================================================

/**
 * One step of `alignWithPairing`. `equal` items have the same hash; `pair`
 * items share a group but differ.
 */
export type AlignmentStep<T> =
  | { op: 'equal' | 'pair'; item1: T; item2: T }
  | { op: 'delete'; item1: T }
  | { op: 'insert'; item2: T };

/** Largest score table `alignWithPairing` builds; beyond it items pair by position */
export const MAX_PAIRING_CELLS = 1 << 25;

const DIAGONAL = 1;
const DELETE = 2;
const INSERT = 3;

/**
 * Align two arrays, pairing unequal items of the same group.
 *
 * The common prefix and suffix are matched first. The rest is aligned by a
 * dynamic program that maximizes, in order: exact matches, pairs of any
 * kind, matches and pairs in group 0, then in group 1. That order fixes the
 * number of unaligned items per group, so swapping the inputs mirrors the
 * added and deleted counts. Ties go to the earliest pairing.
 *
 * When the remaining span would need more than `MAX_PAIRING_CELLS` cells,
 * the k-th item of a group pairs with the k-th item of that group instead.
 */
export function alignWithPairing<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[],
  groupOf: (item: T) => number = () => 0
): AlignmentStep<T>[] {
  let start = 0;
  while (
    start < items1.length &&
    start < items2.length &&
    items1[start].hash === items2[start].hash
  ) {
    start++;
  }

  let end1 = items1.length;
  let end2 = items2.length;
  while (end1 > start && end2 > start && items1[end1 - 1].hash === items2[end2 - 1].hash) {
    end1--;
    end2--;
  }

  const steps: AlignmentStep<T>[] = [];
  for (let i = 0; i < start; i++) {
    steps.push({ op: 'equal', item1: items1[i], item2: items2[i] });
  }

  const middle1 = items1.slice(start, end1);
  const middle2 = items2.slice(start, end2);
  const base = Math.min(middle1.length, middle2.length) + 1;
  const fits =
    (middle1.length + 1) * (middle2.length + 1) <= MAX_PAIRING_CELLS &&
    base ** 4 <= Number.MAX_SAFE_INTEGER;

  const middle = fits
    ? pairByScore(middle1, middle2, groupOf)
    : pairByPosition(middle1, middle2, groupOf);
  for (const step of middle) {
    steps.push(step);
  }

  for (let i = end1; i < items1.length; i++) {
    steps.push({ op: 'equal', item1: items1[i], item2: items2[i - end1 + end2] });
  }

  return steps;
}

/**
 * Scores are four counters packed into one number, each below `base`:
 * matches, pairs, group 0 alignments, group 1 alignments.
 */
function pairByScore<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[],
  groupOf: (item: T) => number
): AlignmentStep<T>[] {
  const n = items1.length;
  const m = items2.length;
  const width = m + 1;
  const base = Math.min(n, m) + 1;
  const matchWeight = base ** 3;
  const pairWeight = base ** 2;
  const groupWeight = (group: number): number => (group === 0 ? base : group === 1 ? 1 : 0);

  const groups1 = items1.map(groupOf);
  const groups2 = items2.map(groupOf);
  const moves = new Uint8Array((n + 1) * width);

  // Best score of items1[i..] against items2[j..]; `next` is row i + 1
  let next = new Float64Array(width);
  let row = new Float64Array(width);
  for (let j = 0; j < m; j++) {
    moves[n * width + j] = INSERT;
  }

  for (let i = n - 1; i >= 0; i--) {
    row[m] = 0;
    moves[i * width + m] = DELETE;

    for (let j = m - 1; j >= 0; j--) {
      let best = next[j];
      let move = DELETE;
      if (row[j + 1] > best) {
        best = row[j + 1];
        move = INSERT;
      }
      if (groups1[i] === groups2[j]) {
        const weight =
          (items1[i].hash === items2[j].hash ? matchWeight : pairWeight) + groupWeight(groups1[i]);
        if (next[j + 1] + weight >= best) {
          best = next[j + 1] + weight;
          move = DIAGONAL;
        }
      }
      row[j] = best;
      moves[i * width + j] = move;
    }

    [row, next] = [next, row];
  }

  const steps: AlignmentStep<T>[] = [];
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const move = moves[i * width + j];
    if (move === DIAGONAL) {
      const op = items1[i].hash === items2[j].hash ? 'equal' : 'pair';
      steps.push({ op, item1: items1[i], item2: items2[j] });
      i++;
      j++;
    } else if (move === DELETE) {
      steps.push({ op: 'delete', item1: items1[i] });
      i++;
    } else {
      steps.push({ op: 'insert', item2: items2[j] });
      j++;
    }
  }

  return steps;
}

/**
 * The k-th item of a group in items1 pairs with the k-th of that group in
 * items2. Steps follow items1, then the unpaired items of items2.
 */
function pairByPosition<T extends Hashable>(
  items1: readonly T[],
  items2: readonly T[],
  groupOf: (item: T) => number
): AlignmentStep<T>[] {
  const queues = new Map<number, { items: T[]; next: number }>();
  for (const item of items2) {
    const group = groupOf(item);
    const queue = queues.get(group);
    if (queue) {
      queue.items.push(item);
    } else {
      queues.set(group, { items: [item], next: 0 });
    }
  }

  const steps: AlignmentStep<T>[] = [];
  const paired = new Set<T>();
  for (const item1 of items1) {
    const queue = queues.get(groupOf(item1));
    if (queue && queue.next < queue.items.length) {
      const item2 = queue.items[queue.next++];
      paired.add(item2);
      steps.push({ op: item1.hash === item2.hash ? 'equal' : 'pair', item1, item2 });
    } else {
      steps.push({ op: 'delete', item1 });
    }
  }
  for (const item2 of items2) {
    if (!paired.has(item2)) {
      steps.push({ op: 'insert', item2 });
    }
  }

  return steps;
}
