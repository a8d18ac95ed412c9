/**
 * Sort driver: orders processed lines with the inverse comparator,
 * in-thread or across worker threads.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import { resolveLimits } from "../../limits.js";
import type { SortLogger } from "../../types.js";
import { createKeyComparator, createLineComparator } from "./comparator.js";
import {
  type IndexComparator,
  mergeRunsStable,
  mergeRunsUnstable,
  sortRun,
  splitRanges,
} from "./merge.js";
import type { WorkerInput, WorkerOutput } from "./sort-worker.js";
import type { ProcessedLine, SortConfig, SortRunOptions } from "./types.js";

/**
 * Sort in place on the calling thread and return the same array.
 * Array#sort is stable, which satisfies both stable and unstable requests.
 */
export function sortProcessedLines(
  lines: ProcessedLine[],
  config: SortConfig,
  options: SortRunOptions = {},
): ProcessedLine[] {
  options.logger?.debug("sort", {
    lines: lines.length,
    stable: config.stable,
    parallel: false,
  });
  return lines.sort(createLineComparator(config));
}

/**
 * Sort using worker threads once the input reaches `parallelThreshold`
 * lines. Each worker sorts one contiguous chunk; the runs are merged here.
 * With `stable`, runs are merged pairwise in input order so equal keys keep
 * their input order for any worker count.
 */
export async function sortProcessedLinesParallel(
  lines: ProcessedLine[],
  config: SortConfig,
  options: SortRunOptions = {},
): Promise<ProcessedLine[]> {
  const limits = resolveLimits(options.limits);
  if (lines.length < limits.parallelThreshold || limits.maxWorkers < 2) {
    return sortProcessedLines(lines, config, options);
  }

  const ranges = splitRanges(lines.length, limits.maxWorkers);
  options.logger?.debug("sort", {
    lines: lines.length,
    stable: config.stable,
    parallel: true,
    chunks: ranges.length,
  });

  const keys = lines.map((line) => line.sortKey);
  const runs = await sortChunks(keys, ranges, config, options.logger);

  const compareKeys = createKeyComparator(config);
  const compare: IndexComparator = (a, b) => compareKeys(keys[a], keys[b]);
  const order = config.stable
    ? mergeRunsStable(runs, compare)
    : mergeRunsUnstable(runs, compare);

  return Array.from(order, (index) => lines[index]);
}

async function sortChunks(
  keys: string[],
  ranges: { start: number; end: number }[],
  config: SortConfig,
  logger?: SortLogger,
): Promise<Uint32Array[]> {
  const compare = createKeyComparator(config);
  const workerPath = findWorkerPath();
  if (workerPath === null) {
    logger?.debug("sort worker not built, sorting chunks in-thread", {
      chunks: ranges.length,
    });
  }

  return Promise.all(
    ranges.map(async ({ start, end }) => {
      const chunk = keys.slice(start, end);
      if (workerPath === null) {
        return sortRun(chunk, start, compare);
      }
      try {
        return await executeInWorker(workerPath, {
          config: { ...config },
          keys: chunk,
          offset: start,
        });
      } catch (e) {
        logger?.debug("sort worker failed, sorting chunk in-thread", {
          start,
          end,
          error: e instanceof Error ? e.message : String(e),
        });
        return sortRun(chunk, start, compare);
      }
    }),
  );
}

/**
 * Find the compiled sort-worker.js file path.
 * Checks multiple locations for different environments:
 * - ./sort-worker.js (running from dist/)
 * - ../../../dist/commands/ssort/sort-worker.js (tests from src/)
 * Returns null when the worker has not been built.
 */
function findWorkerPath(): string | null {
  const currentDir = dirname(fileURLToPath(import.meta.url));

  const distPath = join(currentDir, "sort-worker.js");
  if (existsSync(distPath)) {
    return distPath;
  }

  const srcToDistPath = join(
    currentDir,
    "../../../dist/commands/ssort/sort-worker.js",
  );
  if (existsSync(srcToDistPath)) {
    return srcToDistPath;
  }

  return null;
}

/**
 * Sort one chunk on a new worker thread. Rejects when the worker reports
 * a failure, throws, or exits before posting a result.
 */
export function executeInWorker(
  workerPath: string | URL,
  input: WorkerInput,
): Promise<Uint32Array> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(workerPath, { workerData: input });
    let settled = false;

    worker.once("message", (result: WorkerOutput) => {
      settled = true;
      if (result.success) {
        resolve(result.run);
      } else {
        reject(new Error(result.error));
      }
    });

    worker.once("error", (err) => {
      settled = true;
      reject(err);
    });

    worker.once("exit", (code) => {
      if (!settled) {
        reject(new Error(`Worker exited with code ${code}`));
      }
    });
  });
}
