/**
 * Worker thread that sorts one chunk of normalized keys.
 *
 * The comparator cannot cross the thread boundary, so the worker rebuilds
 * it from the (plain, cloneable) config.
 */

import { parentPort, workerData } from "node:worker_threads";
import { createKeyComparator } from "./comparator.js";
import { sortRun } from "./merge.js";
import type { SortConfig } from "./types.js";

export interface WorkerInput {
  config: SortConfig;
  keys: string[];
  /** Global index of keys[0] */
  offset: number;
}

export interface WorkerSuccess {
  success: true;
  run: Uint32Array<ArrayBuffer>;
}

export interface WorkerError {
  success: false;
  error: string;
}

export type WorkerOutput = WorkerSuccess | WorkerError;

export function isWorkerInput(data: unknown): data is WorkerInput {
  return (
    typeof data === "object" &&
    data !== null &&
    "config" in data &&
    typeof data.config === "object" &&
    data.config !== null &&
    "keys" in data &&
    Array.isArray(data.keys) &&
    "offset" in data &&
    typeof data.offset === "number"
  );
}

export function sortChunk(input: WorkerInput): WorkerOutput {
  try {
    const compare = createKeyComparator(input.config);
    return { success: true, run: sortRun(input.keys, input.offset, compare) };
  } catch (e) {
    return { success: false, error: e instanceof Error ? e.message : String(e) };
  }
}

// Execute when run as worker
if (parentPort && isWorkerInput(workerData)) {
  const output = sortChunk(workerData);
  if (output.success) {
    parentPort.postMessage(output, [output.run.buffer]);
  } else {
    parentPort.postMessage(output);
  }
}
