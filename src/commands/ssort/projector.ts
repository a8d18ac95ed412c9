/**
 * Output projection: full line or bare key, optionally right-aligned so
 * that all keys end in the same column.
 */

import { countCodePoints } from "./code-points.js";
import type { PaddingInfo, ProcessedLine, SortConfig } from "./types.js";

// Word-only output is the full line again when the key is the whole line
function projectsWords(config: SortConfig): boolean {
  return config.wordOnly && !config.useEntireLine;
}

// Full lines in dictionary order align on a word's end, which a line
// without a word does not have
function padsNoWord(
  config: SortConfig,
  measure: PaddingInfo["measure"],
): boolean {
  return (
    measure === "keyLength" || !config.dictionaryOrder || config.useEntireLine
  );
}

function measureLine(
  line: ProcessedLine,
  measure: PaddingInfo["measure"],
  config: SortConfig,
): number | null {
  if (line.keyStart === null) {
    return padsNoWord(config, measure) ? 0 : null;
  }
  const keyLength = countCodePoints(line.key);
  return measure === "keyLength" ? keyLength : line.keyStart + keyLength;
}

/**
 * Padding for the whole output set, or null without right-alignment.
 * Lines without a word measure as zero wide, except full lines in
 * dictionary order, which stay unpadded.
 */
export function computePaddingInfo(
  lines: readonly ProcessedLine[],
  config: SortConfig,
): PaddingInfo | null {
  if (!config.rightAlign) {
    return null;
  }
  const measure = projectsWords(config) ? "keyLength" : "keyEnd";
  let width = 0;
  for (const line of lines) {
    const value = measureLine(line, measure, config);
    if (value !== null && value > width) {
      width = value;
    }
  }
  return { measure, width };
}

export function projectLines(
  lines: readonly ProcessedLine[],
  config: SortConfig,
  padding: PaddingInfo | null,
): string[] {
  const words = projectsWords(config);
  return lines.map((line) => {
    const text = words ? line.key : line.original;
    if (padding === null) {
      return text;
    }
    const used = measureLine(line, padding.measure, config);
    if (used === null) {
      return text;
    }
    return " ".repeat(Math.max(0, padding.width - used)) + text;
  });
}
