import { BufferedLogger } from "../../logger.js";
import type { Command, CommandContext, ExecResult } from "../../types.js";
import { parseArgs } from "../../utils/args.js";
import { formatLines, readLines } from "../../utils/file-reader.js";
import { type HelpInfo, hasHelpFlag, showHelp } from "../help.js";
import { createSortConfig } from "./config.js";
import { processLines, renderOutput } from "./pipeline.js";

export const SSORT_VERSION = "0.1.0";

const ssortHelp: HelpInfo = {
  name: "ssort",
  summary:
    "inverse lexicographic (suffix) sort by first word (default) or whole line",
  usage: "ssort [OPTION]... [FILE]...",
  description: [
    "The inverse lexicographic sort, a.k.a. suffix sort, is a sort order",
    "where strings are compared from the last character towards the first.",
    "",
    "With no FILE, or when FILE is -, read standard input.",
  ],
  sections: [
    {
      heading: "Sorting Options",
      options: [
        "-i, --ignore-case       ignore case when sorting",
        "-l, --line              use entire line for sorting instead of first word",
        "-d, --dictionary-order  ignore non-alphabetic characters when finding first word",
        "-H, --hyphenated        with -d, let '-' continue a word (well-known)",
        "-r, --reverse           reverse the sort order",
        "-s, --stable            stable sort (maintains original order of equal elements)",
        "-n, --normalize         normalize unicode to NFC form",
      ],
    },
    {
      heading: "Output",
      options: [
        "-a, --right-align       right-align output by adding leading spaces",
        "-x, --exclude-no-word   exclude lines without words",
        "-w, --word-only         output only the word used for sorting",
        "-v, --verbose           trace processing on standard error",
        "-h, --help              display this help and exit",
        "-V, --version           output version information and exit",
      ],
    },
  ],
  examples: [
    "ssort words.txt           # group words by their endings",
    "ssort -d -w -a text.txt   # right-aligned first words, punctuation skipped",
    "ssort -l -i -s list.txt   # whole lines, case-insensitive, stable",
  ],
};

export const SSORT_FLAGS = {
  ignoreCase: { short: "i", long: "ignore-case" },
  useEntireLine: { short: "l", long: "line" },
  dictionaryOrder: { short: "d", long: "dictionary-order" },
  hyphenated: { short: "H", long: "hyphenated" },
  reverse: { short: "r", long: "reverse" },
  stable: { short: "s", long: "stable" },
  normalize: { short: "n", long: "normalize" },
  rightAlign: { short: "a", long: "right-align" },
  excludeNoWord: { short: "x", long: "exclude-no-word" },
  wordOnly: { short: "w", long: "word-only" },
  verbose: { short: "v", long: "verbose" },
  help: { short: "h", long: "help" },
  version: { short: "V", long: "version" },
};

export const ssortCommand: Command = {
  name: "ssort",

  async execute(args: string[], ctx: CommandContext): Promise<ExecResult> {
    if (hasHelpFlag(args)) {
      return showHelp(ssortHelp);
    }

    const parsed = parseArgs("ssort", args, SSORT_FLAGS);
    if (!parsed.ok) return parsed.error;
    const { flags, positional: files } = parsed.result;

    if (flags.help) {
      return showHelp(ssortHelp);
    }
    if (flags.version) {
      return { stdout: `ssort ${SSORT_VERSION}\n`, stderr: "", exitCode: 0 };
    }

    const verbose = flags.verbose
      ? new BufferedLogger("ssort", ctx.logger)
      : null;
    const logger = verbose ?? ctx.logger;

    const config = createSortConfig({
      ignoreCase: flags.ignoreCase,
      useEntireLine: flags.useEntireLine,
      dictionaryOrder: flags.dictionaryOrder,
      hyphenated: flags.hyphenated,
      reverse: flags.reverse,
      stable: flags.stable,
      normalize: flags.normalize,
      rightAlign: flags.rightAlign,
      excludeNoWord: flags.excludeNoWord,
      wordOnly: flags.wordOnly,
    });

    const input = await readLines(ctx, files, { cmdName: "ssort" });
    if (!input.ok) {
      logger?.info("exit", { exitCode: input.error.exitCode });
      return {
        ...input.error,
        stderr: (verbose?.output() ?? "") + input.error.stderr,
      };
    }

    const result = await processLines(config, input.lines, {
      logger,
      limits: ctx.limits,
    });
    const stdout = formatLines(renderOutput(result, config));
    logger?.info("exit", { exitCode: 0 });

    return { stdout, stderr: verbose?.output() ?? "", exitCode: 0 };
  },
};
