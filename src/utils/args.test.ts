import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

const defs = {
  reverse: { short: "r", long: "reverse" },
  stable: { short: "s", long: "stable" },
  wordOnly: { short: "w", long: "word-only" },
};

describe("parseArgs", () => {
  it("defaults every flag to false", () => {
    const parsed = parseArgs("ssort", ["file.txt"], defs);
    if (!parsed.ok) throw new Error("expected success");
    expect({ ...parsed.result.flags }).toEqual({
      reverse: false,
      stable: false,
      wordOnly: false,
    });
    expect(parsed.result.positional).toEqual(["file.txt"]);
  });

  it("parses short, combined and long flags", () => {
    const parsed = parseArgs("ssort", ["-rs", "--word-only", "a", "b"], defs);
    if (!parsed.ok) throw new Error("expected success");
    expect({ ...parsed.result.flags }).toEqual({
      reverse: true,
      stable: true,
      wordOnly: true,
    });
    expect(parsed.result.positional).toEqual(["a", "b"]);
  });

  it("treats - as a positional argument", () => {
    const parsed = parseArgs("ssort", ["-", "-r"], defs);
    if (!parsed.ok) throw new Error("expected success");
    expect(parsed.result.positional).toEqual(["-"]);
    expect(parsed.result.flags.reverse).toBe(true);
  });

  it("stops option parsing at --", () => {
    const parsed = parseArgs("ssort", ["-s", "--", "-r", "--stable"], defs);
    if (!parsed.ok) throw new Error("expected success");
    expect(parsed.result.flags.reverse).toBe(false);
    expect(parsed.result.positional).toEqual(["-r", "--stable"]);
  });

  it("rejects an unknown short flag inside a group", () => {
    const parsed = parseArgs("ssort", ["-rz"], defs);
    expect(parsed).toEqual({
      ok: false,
      error: {
        stdout: "",
        stderr: "ssort: invalid option -- 'z'\n",
        exitCode: 1,
      },
    });
  });

  it("rejects an unknown long flag", () => {
    const parsed = parseArgs("ssort", ["--stable=yes"], defs);
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.stderr).toBe(
      "ssort: unrecognized option '--stable=yes'\n",
    );
  });

  it("does not resolve names from the object prototype", () => {
    const parsed = parseArgs("ssort", ["--constructor"], defs);
    expect(parsed.ok).toBe(false);
  });
});
