#!/usr/bin/env node
/**
 * ssort CLI - inverse lexicographic (suffix) sort
 *
 * Usage:
 *   ssort [OPTION]... [FILE]...
 *   cat words.txt | ssort -d -w
 *
 * Reads the real filesystem through NodeFs. Standard input is only read
 * when no FILE is given or a FILE is "-".
 */

import { ssortCommand, SSORT_FLAGS } from "../commands/ssort/ssort.js";
import { decodeUtf8 } from "../fs/encoding.js";
import { NodeFs } from "../fs/node-fs/node-fs.js";
import { parseArgs } from "../utils/args.js";
import { describeReadError } from "../utils/file-reader.js";

async function readStdin(): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

function needsStdin(args: string[]): boolean {
  const parsed = parseArgs("ssort", args, SSORT_FLAGS);
  if (!parsed.ok) return false;
  const { flags, positional } = parsed.result;
  if (flags.help || flags.version) return false;
  return positional.length === 0 || positional.includes("-");
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  let stdin = "";
  if (needsStdin(args)) {
    try {
      stdin = decodeUtf8(await readStdin(), "-");
    } catch (e) {
      process.stderr.write(`ssort: -: ${describeReadError(e)}\n`);
      return 1;
    }
  }

  const result = await ssortCommand.execute(args, {
    fs: new NodeFs(),
    cwd: process.cwd(),
    stdin,
  });

  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  return result.exitCode;
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error("ssort:", error instanceof Error ? error.message : error);
    process.exitCode = 2;
  },
);
