import { describe, expect, it } from "vitest";
import { createSortConfig } from "./config.js";
import { foldCase, normalizeKey } from "./normalizer.js";

describe("normalizeKey", () => {
  it("returns the key unchanged by default", () => {
    expect(normalizeKey("Café", createSortConfig())).toBe("Café");
  });

  it("composes to NFC with normalize", () => {
    const config = createSortConfig({ normalize: true });
    expect(normalizeKey("cafe\u0301", config)).toBe("caf\u00e9");
  });

  it("folds case with ignoreCase", () => {
    const config = createSortConfig({ ignoreCase: true });
    expect(normalizeKey("ÀPPLE", config)).toBe("àpple");
  });

  it("normalizes before folding", () => {
    const config = createSortConfig({ normalize: true, ignoreCase: true });
    expect(normalizeKey("E\u0301TE\u0301", config)).toBe("\u00e9t\u00e9");
  });

  it("passes unpaired surrogates through", () => {
    const config = createSortConfig({ normalize: true, ignoreCase: true });
    expect(normalizeKey("\ud800A", config)).toBe("\ud800a");
  });
});

describe("foldCase", () => {
  it("folds a word-final capital sigma like any other sigma", () => {
    expect(foldCase("ΟΔΟΣ")).toBe("οδοσ");
  });

  it("keeps astral characters intact", () => {
    expect(foldCase("😀A")).toBe("😀a");
  });
});
