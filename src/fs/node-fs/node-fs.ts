/**
 * NodeFs - Read-only wrapper around the real filesystem
 *
 * Paths are real OS paths; relative operands are resolved against the
 * caller's working directory. Content is decoded as strict UTF-8.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { decodeUtf8, FileTooLargeError } from "../encoding.js";
import type { IFileSystem } from "../interface.js";

export interface NodeFsOptions {
  /**
   * Maximum file size in bytes that can be read.
   * Files larger than this will throw an EFBIG error.
   * Defaults to 0 (no limit).
   */
  maxFileReadSize?: number;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export class NodeFs implements IFileSystem {
  private readonly maxFileReadSize: number;

  constructor(options: NodeFsOptions = {}) {
    this.maxFileReadSize = options.maxFileReadSize ?? 0;
  }

  async readFile(path: string): Promise<string> {
    if (path.includes("\0")) {
      throw new Error(`ENOENT: path contains null byte, open '${path}'`);
    }

    let content: Buffer;
    try {
      if (this.maxFileReadSize > 0) {
        const stat = await fs.promises.stat(path);
        if (stat.isFile() && stat.size > this.maxFileReadSize) {
          throw new FileTooLargeError(path, stat.size, this.maxFileReadSize);
        }
      }
      content = await fs.promises.readFile(path);
    } catch (e) {
      throw this.toReadError(e, path, "open");
    }
    return decodeUtf8(new Uint8Array(content), path);
  }

  resolvePath(base: string, path: string): string {
    return nodePath.resolve(base, path);
  }

  /**
   * Replace Node's error with one carrying only the errno code and the
   * operand as the user typed it.
   */
  private toReadError(e: unknown, path: string, operation: string): Error {
    if (e instanceof FileTooLargeError) {
      return e;
    }
    const code = isErrnoException(e) && e.code ? e.code : "EIO";
    return new Error(`${code}: ${operation} '${path}'`, { cause: e });
  }
}
