import { describe, expect, it } from "vitest";
import { InvalidEncodingError } from "../encoding.js";
import { InMemoryFs } from "./in-memory-fs.js";

describe("InMemoryFs", () => {
  it("reads string content", async () => {
    const fs = new InMemoryFs({ "/words/list.txt": "rhyme\ntime\n" });
    expect(await fs.readFile("/words/list.txt")).toBe("rhyme\ntime\n");
  });

  it("decodes UTF-8 byte content", async () => {
    const fs = new InMemoryFs({
      "/cafe.txt": new Uint8Array([0x63, 0x61, 0x66, 0xc3, 0xa9]),
    });
    expect(await fs.readFile("/cafe.txt")).toBe("café");
  });

  it("drops a leading byte order mark", async () => {
    const fs = new InMemoryFs({
      "/bom.txt": new Uint8Array([0xef, 0xbb, 0xbf, 0x61]),
    });
    expect(await fs.readFile("/bom.txt")).toBe("a");
  });

  it("rejects invalid UTF-8", async () => {
    const fs = new InMemoryFs({ "/bad.txt": new Uint8Array([0xc3, 0x28]) });
    await expect(fs.readFile("/bad.txt")).rejects.toBeInstanceOf(
      InvalidEncodingError,
    );
  });

  it("throws ENOENT for missing files", async () => {
    const fs = new InMemoryFs();
    await expect(fs.readFile("/missing.txt")).rejects.toThrow(
      "ENOENT: no such file or directory, open '/missing.txt'",
    );
  });

  it("throws EISDIR for directories", async () => {
    const fs = new InMemoryFs({ "/dir/file.txt": "x" });
    await expect(fs.readFile("/dir")).rejects.toThrow(
      "EISDIR: illegal operation on a directory, read '/dir'",
    );
  });

  it("rejects paths containing null bytes", async () => {
    const fs = new InMemoryFs({ "/a.txt": "x" });
    await expect(fs.readFile("/a.txt\0.png")).rejects.toThrow("null byte");
  });

  it("treats the root and file parents as directories", async () => {
    const fs = new InMemoryFs({ "/dir/sub/file.txt": "x" });
    await expect(fs.readFile("/")).rejects.toThrow("EISDIR");
    await expect(fs.readFile("/dir/sub")).rejects.toThrow("EISDIR");
    await expect(fs.readFile("/di")).rejects.toThrow("ENOENT");
  });

  it("normalizes paths on write and read", async () => {
    const fs = new InMemoryFs({ "dir//./file.txt": "x" });
    expect(await fs.readFile("/dir/sub/../file.txt")).toBe("x");
  });

  it("resolves relative paths against a base", () => {
    const fs = new InMemoryFs();
    expect(fs.resolvePath("/home/user", "notes.txt")).toBe(
      "/home/user/notes.txt",
    );
    expect(fs.resolvePath("/home/user", "../x")).toBe("/home/x");
    expect(fs.resolvePath("/", "x")).toBe("/x");
    expect(fs.resolvePath("/home", "/abs/y")).toBe("/abs/y");
  });
});
