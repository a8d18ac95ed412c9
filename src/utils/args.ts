/**
 * Lightweight argument parser for command implementations.
 *
 * Handles common patterns:
 * - Boolean flags: -r, --reverse
 * - Combined short flags: -il (same as -i -l)
 * - "--" to end option parsing, "-" as a positional (stdin marker)
 * - Positional arguments
 * - Unknown option detection
 */

import { unknownOption } from "../commands/help.js";
import type { ExecResult } from "../types.js";

export interface FlagDef {
  /** Short form without dash, e.g., "r" for -r */
  short?: string;
  /** Long form without dashes, e.g., "reverse" for --reverse */
  long?: string;
}

export interface ParsedArgs<T extends Record<string, FlagDef>> {
  /** Parsed flag values; flags not given are false */
  flags: { [K in keyof T]: boolean };
  /** Positional arguments (non-flag arguments) */
  positional: string[];
}

export type ParseResult<T extends Record<string, FlagDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ExecResult };

/**
 * Parse command arguments according to the provided flag definitions.
 *
 * @param cmdName - Command name for error messages
 *
 * @example
 * const defs = {
 *   reverse: { short: "r", long: "reverse" },
 *   stable: { short: "s", long: "stable" },
 * };
 * const parsed = parseArgs("ssort", args, defs);
 * if (!parsed.ok) return parsed.error;
 * const { flags, positional } = parsed.result;
 */
export function parseArgs<T extends Record<string, FlagDef>>(
  cmdName: string,
  args: string[],
  defs: T,
): ParseResult<T> {
  const shortToName = new Map<string, string>();
  const longToName = new Map<string, string>();

  for (const [name, def] of Object.entries(defs)) {
    if (def.short) shortToName.set(def.short, name);
    if (def.long) longToName.set(def.long, name);
  }

  // Use null-prototype to prevent prototype pollution
  const flags: Record<string, boolean> = Object.create(null);
  for (const name of Object.keys(defs)) {
    flags[name] = false;
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (const arg of args) {
    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const optName = arg.slice(2);
      const name = longToName.get(optName);
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }
      flags[name] = true;
      continue;
    }

    for (const c of arg.slice(1)) {
      const name = shortToName.get(c);
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, `-${c}`) };
      }
      flags[name] = true;
    }
  }

  return {
    ok: true,
    result: {
      flags: flags as ParsedArgs<T>["flags"],
      positional,
    },
  };
}
