/**
 * Shared decoding helpers and errors for file system implementations
 */

import type { FileContent } from "./interface.js";

const textEncoder = new TextEncoder();
// fatal: reject invalid UTF-8 rather than substituting U+FFFD
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Error thrown when input bytes are not valid UTF-8
 */
export class InvalidEncodingError extends Error {
  constructor(path: string) {
    super(`${path}: invalid UTF-8 input`);
    this.name = "InvalidEncodingError";
  }
}

/**
 * Error thrown when a file exceeds the configured read size
 */
export class FileTooLargeError extends Error {
  constructor(path: string, size: number, maxSize: number) {
    super(`EFBIG: file too large, read '${path}' (${size} bytes, max ${maxSize})`);
    this.name = "FileTooLargeError";
  }
}

/**
 * Helper to convert content to Uint8Array
 */
export function toBuffer(content: FileContent): Uint8Array {
  if (content instanceof Uint8Array) {
    return content;
  }
  return textEncoder.encode(content);
}

/**
 * Decode UTF-8 bytes, throwing InvalidEncodingError on malformed input.
 * A leading byte order mark is dropped.
 */
export function decodeUtf8(buffer: Uint8Array, path: string): string {
  try {
    return strictDecoder.decode(buffer);
  } catch (e) {
    if (e instanceof TypeError) {
      throw new InvalidEncodingError(path);
    }
    throw e;
  }
}

/**
 * Normalize an absolute or relative virtual path: resolve `.` and `..`,
 * drop duplicate and trailing slashes.
 */
export function normalizePath(path: string): string {
  if (!path || path === "/") return "/";

  const parts = path.split("/").filter((p) => p && p !== ".");
  const resolved: string[] = [];

  for (const part of parts) {
    if (part === "..") {
      resolved.pop();
    } else {
      resolved.push(part);
    }
  }

  return `/${resolved.join("/")}`;
}

/**
 * Resolve a relative path against a base path
 */
export function resolveVirtualPath(base: string, path: string): string {
  if (path.startsWith("/")) {
    return normalizePath(path);
  }
  const combined = base === "/" ? `/${path}` : `${base}/${path}`;
  return normalizePath(combined);
}
