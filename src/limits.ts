/**
 * Sort Limits Configuration
 *
 * Centralized configuration for the resources a sort run may use.
 * These limits can be overridden per command context or pipeline call.
 */

import { availableParallelism } from "node:os";

/**
 * Configuration for sort limits.
 * All limits are optional - undefined values use defaults.
 */
export interface SortLimits {
  /** Minimum number of lines before worker threads are used (default: 100000) */
  parallelThreshold?: number;

  /** Maximum number of worker threads (default: available parallelism) */
  maxWorkers?: number;
}

const DEFAULT_PARALLEL_THRESHOLD = 100000;

/**
 * Resolve sort limits by merging user-provided limits with defaults.
 */
export function resolveLimits(userLimits?: SortLimits): Required<SortLimits> {
  const maxWorkers = userLimits?.maxWorkers ?? availableParallelism();
  return {
    parallelThreshold: Math.max(
      0,
      userLimits?.parallelThreshold ?? DEFAULT_PARALLEL_THRESHOLD,
    ),
    maxWorkers: Math.max(1, Math.floor(maxWorkers)),
  };
}
