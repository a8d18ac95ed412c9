// Comparator functions for ssort command

import { codePointBefore } from "./code-points.js";
import { normalizeKey } from "./normalizer.js";
import type { KeyComparator, ProcessedLine, SortConfig } from "./types.js";

/**
 * Inverse lexicographic comparison of two normalized keys.
 *
 * Code points are compared from the end of each key toward the start.
 * When one key is a suffix of the other, the shorter key sorts first.
 */
export function compareInverse(a: string, b: string): -1 | 0 | 1 {
  let i = a.length;
  let j = b.length;

  while (i > 0 && j > 0) {
    const ca = codePointBefore(a, i);
    const cb = codePointBefore(b, j);
    if (ca !== cb) {
      return ca < cb ? -1 : 1;
    }
    i -= ca > 0xffff ? 2 : 1;
    j -= cb > 0xffff ? 2 : 1;
  }

  if (i > 0) return 1;
  if (j > 0) return -1;
  return 0;
}

/**
 * Comparator over keys that are already normalized for `config`
 */
export function createKeyComparator(config: SortConfig): KeyComparator {
  if (config.reverse) {
    return (a, b) => compareInverse(b, a);
  }
  return compareInverse;
}

/**
 * Standalone comparator over raw strings, for callers driving their own
 * sort. Both arguments are normalized per `config` before comparison.
 *
 * @example
 * const compare = getComparer(createSortConfig({ ignoreCase: true }));
 * ["Sing", "bring", "ring"].sort(compare); // ["ring", "bring", "Sing"]
 */
export function getComparer(config: SortConfig): KeyComparator {
  const compareKeys = createKeyComparator(config);
  return (a, b) =>
    compareKeys(normalizeKey(a, config), normalizeKey(b, config));
}

/**
 * Comparator over processed lines, by their normalized keys
 */
export function createLineComparator(
  config: SortConfig,
): (a: ProcessedLine, b: ProcessedLine) => number {
  const compareKeys = createKeyComparator(config);
  return (a, b) => compareKeys(a.sortKey, b.sortKey);
}
