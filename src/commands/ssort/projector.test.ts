import { describe, expect, it } from "vitest";
import { createSortConfig } from "./config.js";
import { extractKey } from "./extractor.js";
import { normalizeKey } from "./normalizer.js";
import { computePaddingInfo, projectLines } from "./projector.js";
import type { ProcessedLine, SortConfig } from "./types.js";

// Processed lines in input order (projection does not depend on sorting)
function toLines(raw: string[], config: SortConfig): ProcessedLine[] {
  return raw.map((original, index) => {
    const { key, start } = extractKey(original, config);
    return {
      original,
      key,
      sortKey: normalizeKey(key, config),
      index,
      keyStart: start,
    };
  });
}

function project(raw: string[], config: SortConfig): string[] {
  const lines = toLines(raw, config);
  return projectLines(lines, config, computePaddingInfo(lines, config));
}

describe("computePaddingInfo", () => {
  it("returns null without right-alignment", () => {
    const config = createSortConfig();
    expect(computePaddingInfo(toLines(["a b"], config), config)).toBeNull();
  });

  it("measures the furthest key end for full lines", () => {
    const config = createSortConfig({ rightAlign: true });
    const lines = toLines(["cat sat", "  horse ran", "x"], config);
    expect(computePaddingInfo(lines, config)).toEqual({
      measure: "keyEnd",
      width: 7,
    });
  });

  it("measures the longest key for word-only output", () => {
    const config = createSortConfig({ rightAlign: true, wordOnly: true });
    const lines = toLines(["cat sat", "  horse ran", "x"], config);
    expect(computePaddingInfo(lines, config)).toEqual({
      measure: "keyLength",
      width: 5,
    });
  });

  it("is zero wide for no lines", () => {
    const config = createSortConfig({ rightAlign: true });
    expect(computePaddingInfo([], config)).toEqual({
      measure: "keyEnd",
      width: 0,
    });
  });
});

describe("projectLines", () => {
  it("outputs original lines by default", () => {
    expect(project(["cat sat", "  horse ran"], createSortConfig())).toEqual([
      "cat sat",
      "  horse ran",
    ]);
  });

  it("outputs only the key with wordOnly", () => {
    const config = createSortConfig({ wordOnly: true });
    expect(project(["cat sat", "  horse ran", "x", "   "], config)).toEqual([
      "cat",
      "horse",
      "x",
      "",
    ]);
  });

  it("outputs the original-case key with ignoreCase and normalize", () => {
    const config = createSortConfig({
      wordOnly: true,
      ignoreCase: true,
      normalize: true,
    });
    expect(project(["Café noir"], config)).toEqual(["Café"]);
  });

  it("aligns the ends of keys in full lines", () => {
    const config = createSortConfig({ rightAlign: true });
    expect(project(["cat sat", "  horse ran", "x", "   "], config)).toEqual([
      "    cat sat",
      "  horse ran",
      "      x",
      "          ",
    ]);
  });

  it("aligns bare keys with wordOnly", () => {
    const config = createSortConfig({ rightAlign: true, wordOnly: true });
    expect(project(["cat sat", "  horse ran", "x", "   "], config)).toEqual([
      "  cat",
      "horse",
      "    x",
      "     ",
    ]);
  });

  it("aligns dictionary-order words after skipped punctuation", () => {
    const config = createSortConfig({ rightAlign: true, dictionaryOrder: true });
    expect(project(["--foo bar", "x-ray", "!!!"], config)).toEqual([
      "--foo bar",
      "    x-ray",
      "!!!",
    ]);
  });

  it("pads lines without a word to the full width", () => {
    const lineConfig = createSortConfig({ rightAlign: true, useEntireLine: true });
    expect(project(["abc", "", "x"], lineConfig)).toEqual(["abc", "   ", "  x"]);

    const wordConfig = createSortConfig({
      rightAlign: true,
      wordOnly: true,
      dictionaryOrder: true,
    });
    expect(project(["well done", "!!!"], wordConfig)).toEqual(["well", "    "]);
  });

  it("counts astral characters as one column", () => {
    const config = createSortConfig({ rightAlign: true });
    expect(project(["😀😀 a", "b"], config)).toEqual(["😀😀 a", " b"]);
  });

  it("treats wordOnly with useEntireLine as full-line output", () => {
    const raw = ["ab", "abcd", ""];
    const lineConfig = createSortConfig({ useEntireLine: true, rightAlign: true });
    const wordConfig = createSortConfig({
      useEntireLine: true,
      rightAlign: true,
      wordOnly: true,
    });
    expect(project(raw, wordConfig)).toEqual(["  ab", "abcd", "    "]);
    expect(project(raw, wordConfig)).toEqual(project(raw, lineConfig));
  });
});
