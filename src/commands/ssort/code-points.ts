// UTF-16 helpers for walking strings by code point

/**
 * Code point ending just before UTF-16 offset `end`. A low surrogate
 * preceded by a high surrogate combines into one code point; unpaired
 * surrogates stand for themselves.
 */
export function codePointBefore(str: string, end: number): number {
  const low = str.charCodeAt(end - 1);
  if (low >= 0xdc00 && low <= 0xdfff && end >= 2) {
    const high = str.charCodeAt(end - 2);
    if (high >= 0xd800 && high <= 0xdbff) {
      return (high - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000;
    }
  }
  return low;
}

/**
 * Number of code points in a string (the display width used for padding)
 */
export function countCodePoints(str: string): number {
  let count = 0;
  for (const _ of str) {
    count++;
  }
  return count;
}
