/**
 * Key extraction: the part of a line used for comparison.
 *
 * - whole line (-l)
 * - first whitespace-delimited token (default)
 * - first run of alphabetic characters (-d), optionally hyphenated (-H)
 */

import type { ExtractedKey, SortConfig } from "./types.js";

const ALPHABETIC = /^\p{Alphabetic}$/u;
const WHITESPACE = /^\p{White_Space}$/u;

type CharTest = (ch: string) => boolean;

const isAlphabetic: CharTest = (ch) => ALPHABETIC.test(ch);
const isWordChar: CharTest = (ch) => !WHITESPACE.test(ch);
const isHyphenatedPart: CharTest = (ch) => ch === "-" || ALPHABETIC.test(ch);

/**
 * Find the first maximal run that starts with a character accepted by
 * `isStart` and continues while `isPart` accepts.
 */
function scanFirstRun(
  line: string,
  isStart: CharTest,
  isPart: CharTest,
): ExtractedKey {
  let offset = 0;
  let column = 0;
  let startOffset = -1;
  let startColumn = 0;

  // for...of walks code points, so surrogate pairs are never split
  for (const ch of line) {
    if (startOffset < 0) {
      if (isStart(ch)) {
        startOffset = offset;
        startColumn = column;
      }
    } else if (!isPart(ch)) {
      return {
        key: line.slice(startOffset, offset),
        wordFound: true,
        start: startColumn,
      };
    }
    offset += ch.length;
    column++;
  }

  if (startOffset < 0) {
    return { key: "", wordFound: false, start: null };
  }
  return { key: line.slice(startOffset), wordFound: true, start: startColumn };
}

export function extractKey(line: string, config: SortConfig): ExtractedKey {
  if (config.useEntireLine) {
    const wordFound = line.length > 0;
    return { key: line, wordFound, start: wordFound ? 0 : null };
  }

  if (config.dictionaryOrder) {
    return scanFirstRun(
      line,
      isAlphabetic,
      config.hyphenated ? isHyphenatedPart : isAlphabetic,
    );
  }

  return scanFirstRun(line, isWordChar, isWordChar);
}
