/**
 * File reading utilities for command implementations.
 *
 * Provides common patterns for reading from files or stdin.
 */

import type { CommandContext, ExecResult } from "../types.js";

export interface ReadFilesOptions {
  /** Command name for error messages */
  cmdName: string;
  /** If true, "-" in file list means stdin */
  allowStdinMarker?: boolean;
  /** If true, stop on first error. If false, collect errors and continue */
  stopOnError?: boolean;
}

export interface FileContent {
  /** File name (or "-" for stdin, or "" if stdin with no files) */
  filename: string;
  /** File content */
  content: string;
}

export interface ReadFilesResult {
  /** Successfully read files */
  files: FileContent[];
  /** Error messages (e.g., "cmd: file: No such file or directory\n") */
  stderr: string;
  /** 0 if all files read successfully, 1 if any errors */
  exitCode: number;
}

const ERRNO_MESSAGES: Record<string, string> = {
  ENOENT: "No such file or directory",
  EISDIR: "Is a directory",
  EACCES: "Permission denied",
  EPERM: "Operation not permitted",
  EFBIG: "File too large",
};

/**
 * Turn a read failure into the human-readable reason shown after the
 * file name. File systems report errno codes as the message prefix.
 */
export function describeReadError(e: unknown): string {
  if (!(e instanceof Error)) {
    return String(e);
  }
  if (e.name === "InvalidEncodingError") {
    return "invalid UTF-8 input";
  }
  const code = /^([A-Z]+):/.exec(e.message)?.[1];
  if (code !== undefined) {
    return ERRNO_MESSAGES[code] ?? e.message;
  }
  return e.message;
}

/**
 * Read content from files or stdin.
 *
 * If files array is empty, reads from stdin.
 * If files contains "-", reads stdin at that position.
 *
 * @example
 * const result = await readFiles(ctx, files, { cmdName: "ssort" });
 * for (const { filename, content } of result.files) {
 *   // process content
 * }
 */
export async function readFiles(
  ctx: CommandContext,
  files: string[],
  options: ReadFilesOptions,
): Promise<ReadFilesResult> {
  const { cmdName, allowStdinMarker = true, stopOnError = false } = options;

  // No files - read from stdin
  if (files.length === 0) {
    return {
      files: [{ filename: "", content: ctx.stdin }],
      stderr: "",
      exitCode: 0,
    };
  }

  const result: FileContent[] = [];
  let stderr = "";
  let exitCode = 0;

  for (const file of files) {
    if (allowStdinMarker && file === "-") {
      result.push({ filename: "-", content: ctx.stdin });
      continue;
    }

    try {
      const filePath = ctx.fs.resolvePath(ctx.cwd, file);
      const content = await ctx.fs.readFile(filePath);
      result.push({ filename: file, content });
    } catch (e) {
      stderr += `${cmdName}: ${file}: ${describeReadError(e)}\n`;
      exitCode = 1;
      if (stopOnError) {
        return { files: result, stderr, exitCode };
      }
    }
  }

  return { files: result, stderr, exitCode };
}

/**
 * Read all inputs and split them into lines, concatenated in operand order.
 *
 * Each input is split separately so a file without a trailing newline does
 * not merge its last line with the next file's first line.
 *
 * @example
 * const result = await readLines(ctx, files, { cmdName: "ssort" });
 * if (!result.ok) return result.error;
 * const lines = result.lines;
 */
export async function readLines(
  ctx: CommandContext,
  files: string[],
  options: { cmdName: string; allowStdinMarker?: boolean },
): Promise<{ ok: true; lines: string[] } | { ok: false; error: ExecResult }> {
  const result = await readFiles(ctx, files, {
    ...options,
    stopOnError: true,
  });

  if (result.exitCode !== 0) {
    return {
      ok: false,
      error: { stdout: "", stderr: result.stderr, exitCode: result.exitCode },
    };
  }

  const lines = result.files.flatMap(({ content }) => splitLines(content));
  return { ok: true, lines };
}

/**
 * Split decoded text into lines. A terminating newline does not produce a
 * trailing empty line; a carriage return before each newline is removed.
 */
export function splitLines(content: string): string[] {
  if (content === "") {
    return [];
  }
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Join output lines, one per line, newline-terminated.
 */
export function formatLines(lines: readonly string[]): string {
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
