import type { SortConfig } from "./types.js";

/**
 * Lower-case each code point on its own. Unlike String#toLowerCase on the
 * whole string this has no context rules, so a word-final capital sigma
 * folds to "σ" like any other.
 */
export function foldCase(key: string): string {
  let folded = "";
  for (const ch of key) {
    folded += ch.toLowerCase();
  }
  return folded;
}

/**
 * Comparison form of a key: NFC first (with -n), then case folding (with -i).
 * Unpaired surrogates have no canonical form and pass through NFC unchanged.
 */
export function normalizeKey(key: string, config: SortConfig): string {
  let result = key;
  if (config.normalize) {
    result = result.normalize("NFC");
  }
  if (config.ignoreCase) {
    result = foldCase(result);
  }
  return result;
}
