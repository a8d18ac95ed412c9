/**
 * Run sorting and merging over index permutations.
 *
 * A run is a Uint32Array of global line indices in sorted order. Chunks of
 * the input are sorted into runs (possibly on worker threads) and merged
 * back on the calling thread.
 */

import type { KeyComparator } from "./types.js";

export type IndexComparator = (a: number, b: number) => number;

/**
 * Sort the keys of one contiguous chunk. Returns global indices
 * (`offset + i`). Equal keys keep their chunk order.
 */
export function sortRun(
  keys: readonly string[],
  offset: number,
  compare: KeyComparator,
): Uint32Array<ArrayBuffer> {
  const order = Array.from({ length: keys.length }, (_, i) => i);
  // Array#sort is stable per ECMAScript 2019
  order.sort((x, y) => compare(keys[x], keys[y]));
  const run = new Uint32Array(order.length);
  for (let i = 0; i < order.length; i++) {
    run[i] = order[i] + offset;
  }
  return run;
}

/**
 * Merge two sorted runs. Ties go to `left`, so merging runs of adjacent
 * chunks in input order keeps equal keys in input order.
 */
export function mergeTwoRuns(
  left: Uint32Array,
  right: Uint32Array,
  compare: IndexComparator,
): Uint32Array {
  const out = new Uint32Array(left.length + right.length);
  let i = 0;
  let j = 0;
  let k = 0;

  while (i < left.length && j < right.length) {
    if (compare(right[j], left[i]) < 0) {
      out[k++] = right[j++];
    } else {
      out[k++] = left[i++];
    }
  }
  while (i < left.length) out[k++] = left[i++];
  while (j < right.length) out[k++] = right[j++];

  return out;
}

/**
 * Stable merge: adjacent runs are merged pairwise, level by level, so every
 * merge sees its left operand come from earlier input than its right.
 */
export function mergeRunsStable(
  runs: readonly Uint32Array[],
  compare: IndexComparator,
): Uint32Array {
  if (runs.length === 0) {
    return new Uint32Array(0);
  }

  let level = [...runs];
  while (level.length > 1) {
    const next: Uint32Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const right = level[i + 1];
      next.push(
        right === undefined ? level[i] : mergeTwoRuns(level[i], right, compare),
      );
    }
    level = next;
  }
  return level[0];
}

interface HeapEntry {
  run: Uint32Array;
  pos: number;
}

/**
 * k-way merge through a binary min-heap keyed only by the comparator.
 * Equal keys from different runs come out in heap order, not input order.
 */
export function mergeRunsUnstable(
  runs: readonly Uint32Array[],
  compare: IndexComparator,
): Uint32Array {
  const total = runs.reduce((sum, run) => sum + run.length, 0);
  const out = new Uint32Array(total);
  const heap: HeapEntry[] = runs
    .filter((run) => run.length > 0)
    .map((run) => ({ run, pos: 0 }));

  const less = (a: HeapEntry, b: HeapEntry): boolean =>
    compare(a.run[a.pos], b.run[b.pos]) < 0;

  const siftDown = (start: number): void => {
    let parent = start;
    for (;;) {
      const l = 2 * parent + 1;
      const r = l + 1;
      let smallest = parent;
      if (l < heap.length && less(heap[l], heap[smallest])) smallest = l;
      if (r < heap.length && less(heap[r], heap[smallest])) smallest = r;
      if (smallest === parent) return;
      [heap[parent], heap[smallest]] = [heap[smallest], heap[parent]];
      parent = smallest;
    }
  };

  for (let i = Math.floor(heap.length / 2) - 1; i >= 0; i--) {
    siftDown(i);
  }

  let k = 0;
  while (heap.length > 0) {
    const top = heap[0];
    out[k++] = top.run[top.pos++];
    if (top.pos === top.run.length) {
      const last = heap.pop();
      if (last !== undefined && heap.length > 0) {
        heap[0] = last;
      }
    }
    siftDown(0);
  }

  return out;
}

/**
 * Split `length` items into at most `parts` contiguous, near-equal ranges.
 */
export function splitRanges(
  length: number,
  parts: number,
): { start: number; end: number }[] {
  const count = Math.max(1, Math.min(parts, length));
  const size = Math.ceil(length / count);
  const ranges: { start: number; end: number }[] = [];
  for (let start = 0; start < length; start += size) {
    ranges.push({ start, end: Math.min(start + size, length) });
  }
  return ranges;
}
