import { describe, expect, it, vi } from "vitest";
import { BufferedLogger } from "./logger.js";
import type { SortLogger } from "./types.js";

describe("BufferedLogger", () => {
  it("collects prefixed lines with key=value data", () => {
    const logger = new BufferedLogger("ssort");
    logger.info("keys extracted", { input: 3, kept: 2 });
    logger.debug("sort", { stable: true });
    logger.info("done");
    expect(logger.output()).toBe(
      "ssort: keys extracted input=3 kept=2\n" +
        "ssort: sort stable=true\n" +
        "ssort: done\n",
    );
  });

  it("starts empty", () => {
    expect(new BufferedLogger("ssort").output()).toBe("");
  });

  it("forwards every call", () => {
    const forward = { info: vi.fn(), debug: vi.fn() } satisfies SortLogger;
    const logger = new BufferedLogger("ssort", forward);
    logger.info("exit", { exitCode: 0 });
    logger.debug("sort");
    expect(forward.info).toHaveBeenCalledWith("exit", { exitCode: 0 });
    expect(forward.debug).toHaveBeenCalledWith("sort", undefined);
  });
});
