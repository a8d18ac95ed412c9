import type { IFileSystem } from "./fs/interface.js";
import type { SortLimits } from "./limits.js";

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Logger interface for sort execution logging.
 * Implement this to capture pipeline tracing (line counts, worker usage).
 */
export interface SortLogger {
  /** Log informational messages (input sizes, dropped lines, exit codes) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (driver choice, worker fallbacks) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to commands during execution.
 *
 * `fs`, `cwd` and `stdin` are always available. `logger` and `limits`
 * are optional; without a logger nothing is traced, without limits the
 * defaults from `resolveLimits()` apply.
 */
export interface CommandContext {
  /** File system used to resolve and read FILE operands */
  fs: IFileSystem;
  /** Current working directory */
  cwd: string;
  /** Standard input content */
  stdin: string;
  logger?: SortLogger;
  limits?: SortLimits;
}

export interface Command {
  name: string;
  execute(args: string[], ctx: CommandContext): Promise<ExecResult>;
}
