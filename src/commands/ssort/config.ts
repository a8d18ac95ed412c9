import type { SortConfig } from "./types.js";

export const DEFAULT_SORT_CONFIG: SortConfig = Object.freeze({
  ignoreCase: false,
  useEntireLine: false,
  dictionaryOrder: false,
  hyphenated: false,
  reverse: false,
  stable: false,
  rightAlign: false,
  excludeNoWord: false,
  wordOnly: false,
  normalize: false,
});

/**
 * Build a frozen configuration; unspecified flags are false.
 */
export function createSortConfig(options: Partial<SortConfig> = {}): SortConfig {
  const d = DEFAULT_SORT_CONFIG;
  return Object.freeze({
    ignoreCase: options.ignoreCase ?? d.ignoreCase,
    useEntireLine: options.useEntireLine ?? d.useEntireLine,
    dictionaryOrder: options.dictionaryOrder ?? d.dictionaryOrder,
    hyphenated: options.hyphenated ?? d.hyphenated,
    reverse: options.reverse ?? d.reverse,
    stable: options.stable ?? d.stable,
    rightAlign: options.rightAlign ?? d.rightAlign,
    excludeNoWord: options.excludeNoWord ?? d.excludeNoWord,
    wordOnly: options.wordOnly ?? d.wordOnly,
    normalize: options.normalize ?? d.normalize,
  });
}
