// Types for ssort command implementation

import type { SortLimits } from "../../limits.js";
import type { SortLogger } from "../../types.js";

/**
 * Flat set of sort options. Every combination is valid; flags that do not
 * apply in a combination are no-ops.
 */
export interface SortConfig {
  readonly ignoreCase: boolean; // fold case for comparison only
  readonly useEntireLine: boolean; // key is the whole line, not the first word
  readonly dictionaryOrder: boolean; // words are runs of alphabetic characters
  readonly hyphenated: boolean; // "-" continues a dictionary-order word
  readonly reverse: boolean;
  readonly stable: boolean; // equal keys keep input order
  readonly rightAlign: boolean;
  readonly excludeNoWord: boolean;
  readonly wordOnly: boolean; // output the key instead of the line
  readonly normalize: boolean; // NFC before comparison
}

export interface ExtractedKey {
  /** Key substring of the line (empty when no word was found) */
  key: string;
  wordFound: boolean;
  /** Code-point column where the key starts, null when no word was found */
  start: number | null;
}

export interface ProcessedLine {
  /** Input line, unchanged */
  original: string;
  /** Extracted key in its original case and encoding */
  key: string;
  /** Normalized key, used only for comparison */
  sortKey: string;
  /** Position of the line in the input */
  index: number;
  /** Code-point column of the key inside `original` */
  keyStart: number | null;
}

export interface PaddingInfo {
  /**
   * "keyEnd": pad full lines so each key ends in column `width`.
   * "keyLength": pad bare keys (word-only output) to `width` code points.
   */
  measure: "keyEnd" | "keyLength";
  width: number;
}

export interface ProcessResult {
  lines: ProcessedLine[];
  padding: PaddingInfo | null;
}

export interface SortRunOptions {
  logger?: SortLogger;
  limits?: SortLimits;
}

export type KeyComparator = (a: string, b: string) => number;
