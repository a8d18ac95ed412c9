import {
  decodeUtf8,
  normalizePath,
  resolveVirtualPath,
  toBuffer,
} from "../encoding.js";
import type { FileContent, IFileSystem, InitialFiles } from "../interface.js";

export type { FileContent, IFileSystem, InitialFiles };

/**
 * Validate that a path does not contain null bytes.
 * Null bytes in paths can be used to truncate filenames or bypass security filters.
 */
function validatePath(path: string, operation: string): void {
  if (path.includes("\0")) {
    throw new Error(`ENOENT: path contains null byte, ${operation} '${path}'`);
  }
}

export class InMemoryFs implements IFileSystem {
  private data: Map<string, Uint8Array> = new Map();

  constructor(initialFiles?: InitialFiles) {
    if (initialFiles) {
      for (const [path, content] of Object.entries(initialFiles)) {
        this.writeFileSync(path, content);
      }
    }
  }

  writeFileSync(path: string, content: FileContent): void {
    validatePath(path, "write");
    this.data.set(normalizePath(path), toBuffer(content));
  }

  async readFile(path: string): Promise<string> {
    validatePath(path, "open");
    const normalized = normalizePath(path);
    const buffer = this.data.get(normalized);
    if (buffer === undefined) {
      if (this.isDirectory(normalized)) {
        throw new Error(
          `EISDIR: illegal operation on a directory, read '${path}'`,
        );
      }
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return decodeUtf8(buffer, path);
  }

  resolvePath(base: string, path: string): string {
    return resolveVirtualPath(base, path);
  }

  private isDirectory(normalized: string): boolean {
    if (normalized === "/") return true;
    const prefix = `${normalized}/`;
    for (const key of this.data.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }
}
