import type { ExecResult } from "../types.js";

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  sections?: { heading: string; options: string[] }[];
  examples?: string[];
}

export function showHelp(info: HelpInfo): ExecResult {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  if (info.description && info.description.length > 0) {
    output += "\nDescription:\n";
    for (const line of info.description) {
      output += line ? `  ${line}\n` : "\n";
    }
  }
  for (const section of info.sections ?? []) {
    if (section.options.length === 0) continue;
    output += `\n${section.heading}:\n`;
    for (const opt of section.options) {
      output += `  ${opt}\n`;
    }
  }
  if (info.examples && info.examples.length > 0) {
    output += "\nExamples:\n";
    for (const example of info.examples) {
      output += `  ${example}\n`;
    }
  }
  return { stdout: output, stderr: "", exitCode: 0 };
}

export function hasHelpFlag(args: string[]): boolean {
  for (const arg of args) {
    if (arg === "--") return false;
    if (arg === "--help" || arg === "-h") return true;
  }
  return false;
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(cmdName: string, option: string): ExecResult {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  const msg = option.startsWith("--")
    ? `${cmdName}: unrecognized option '${option}'\n`
    : `${cmdName}: invalid option -- '${option.replace(/^-/, "")}'\n`;
  return { stdout: "", stderr: msg, exitCode: 1 };
}
