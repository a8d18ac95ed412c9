export type { Command, CommandContext, ExecResult, SortLogger } from "./types.js";
export { resolveLimits } from "./limits.js";
export type { SortLimits } from "./limits.js";
export { BufferedLogger } from "./logger.js";
export { ssortCommand, SSORT_VERSION } from "./commands/ssort/ssort.js";
export { createSortConfig, DEFAULT_SORT_CONFIG } from "./commands/ssort/config.js";
export { extractKey } from "./commands/ssort/extractor.js";
export { foldCase, normalizeKey } from "./commands/ssort/normalizer.js";
export {
  compareInverse,
  createKeyComparator,
  getComparer,
} from "./commands/ssort/comparator.js";
export {
  sortProcessedLines,
  sortProcessedLinesParallel,
} from "./commands/ssort/driver.js";
export { computePaddingInfo, projectLines } from "./commands/ssort/projector.js";
export {
  processLines,
  processLinesSync,
  renderOutput,
} from "./commands/ssort/pipeline.js";
export type {
  ExtractedKey,
  KeyComparator,
  PaddingInfo,
  ProcessedLine,
  ProcessResult,
  SortConfig,
  SortRunOptions,
} from "./commands/ssort/types.js";
export type { IFileSystem, InitialFiles } from "./fs/interface.js";
export { InMemoryFs } from "./fs/in-memory-fs/in-memory-fs.js";
export { NodeFs } from "./fs/node-fs/node-fs.js";
export type { NodeFsOptions } from "./fs/node-fs/node-fs.js";
export { FileTooLargeError, InvalidEncodingError } from "./fs/encoding.js";
