import type { SortLogger } from "./types.js";

function formatData(data?: Record<string, unknown>): string {
  if (!data) return "";
  return Object.entries(data)
    .map(([key, value]) => ` ${key}=${String(value)}`)
    .join("");
}

/**
 * Logger that collects messages as stderr lines ("ssort: message k=v"),
 * optionally forwarding every call to another logger.
 */
export class BufferedLogger implements SortLogger {
  private readonly lines: string[] = [];

  constructor(
    private readonly prefix: string,
    private readonly forward?: SortLogger,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    this.lines.push(`${this.prefix}: ${message}${formatData(data)}\n`);
    this.forward?.info(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.lines.push(`${this.prefix}: ${message}${formatData(data)}\n`);
    this.forward?.debug(message, data);
  }

  /** Collected lines, newline-terminated */
  output(): string {
    return this.lines.join("");
  }
}
