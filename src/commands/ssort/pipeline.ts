/**
 * Line processing pipeline: extract → normalize → filter → pad → sort.
 */

import type { SortLogger } from "../../types.js";
import { sortProcessedLines, sortProcessedLinesParallel } from "./driver.js";
import { extractKey } from "./extractor.js";
import { normalizeKey } from "./normalizer.js";
import { computePaddingInfo, projectLines } from "./projector.js";
import type {
  ProcessedLine,
  ProcessResult,
  SortConfig,
  SortRunOptions,
} from "./types.js";

function prepareLines(
  config: SortConfig,
  rawLines: readonly string[],
  logger?: SortLogger,
): ProcessedLine[] {
  const processed: ProcessedLine[] = [];

  rawLines.forEach((line, index) => {
    const { key, wordFound, start } = extractKey(line, config);
    if (config.excludeNoWord && !wordFound) {
      return;
    }
    processed.push({
      original: line,
      key,
      sortKey: normalizeKey(key, config),
      index,
      keyStart: start,
    });
  });

  logger?.info("keys extracted", {
    input: rawLines.length,
    kept: processed.length,
  });
  return processed;
}

/**
 * Process and sort lines on the calling thread.
 */
export function processLinesSync(
  config: SortConfig,
  lines: readonly string[],
  options: SortRunOptions = {},
): ProcessResult {
  const processed = prepareLines(config, lines, options.logger);
  const padding = computePaddingInfo(processed, config);
  return {
    lines: sortProcessedLines(processed, config, options),
    padding,
  };
}

/**
 * Process and sort lines, using worker threads for large inputs.
 */
export async function processLines(
  config: SortConfig,
  lines: readonly string[],
  options: SortRunOptions = {},
): Promise<ProcessResult> {
  const processed = prepareLines(config, lines, options.logger);
  const padding = computePaddingInfo(processed, config);
  return {
    lines: await sortProcessedLinesParallel(processed, config, options),
    padding,
  };
}

/**
 * Output strings for a processed result, one per line, without newlines.
 */
export function renderOutput(result: ProcessResult, config: SortConfig): string[] {
  return projectLines(result.lines, config, result.padding);
}
