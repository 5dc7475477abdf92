/**
 * CLI Trace Formatter
 *
 * Formats interpreter events for human-readable CLI output.
 * Uses boxen for panels and picocolors for styling.
 */

import boxen from "boxen";
import pc from "picocolors";
import { commandPaths, type InterpreterEvent, type MemoryCommand } from "@memfs/core";
import type { TraceLevel } from "../config/index.js";
import { getDiffSummary, renderDiff } from "../ui/diff-renderer.js";

/**
 * Options for the trace formatter.
 */
export interface TraceFormatterOptions {
  /** Verbosity; quiet prints nothing */
  level: TraceLevel;
  /** Maximum length for argument values before truncation */
  maxContentLength?: number;
  /** Whether to show timestamps */
  showTimestamps?: boolean;
  /** Output sink (default: console.error, keeping stdout for results) */
  write?: (line: string) => void;
}

const BOX_OPTIONS = {
  padding: { left: 1, right: 1, top: 0, bottom: 0 },
  borderStyle: "round",
} as const;

/**
 * Truncate a string to a maximum length.
 */
function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + "...";
}

/**
 * Format duration in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Format command arguments for display, one field per line.
 */
function formatArgs(command: MemoryCommand, maxLen: number): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(command)) {
    if (key === "command" || value === undefined) continue;
    lines.push(`  ${pc.cyan(key)}: ${truncate(JSON.stringify(value), maxLen)}`);
  }
  return lines.join("\n");
}

function describeCommand(command: MemoryCommand): string {
  return `${pc.bold(command.command)} ${commandPaths(command).join(" → ")}`;
}

/**
 * Create a trace formatter for interpreter events.
 */
export function createTraceFormatter(
  options: TraceFormatterOptions
): (event: InterpreterEvent) => void {
  const {
    level,
    maxContentLength = 200,
    showTimestamps = false,
    write = (line: string) => console.error(line),
  } = options;
  const verbose = level === "full" || level === "debug";

  return (event: InterpreterEvent) => {
    if (level === "quiet") return;

    const timestamp = showTimestamps
      ? pc.dim(`[${event.timestamp.toISOString()}] `)
      : "";

    switch (event.type) {
      case "command_start": {
        if (level !== "debug") break;
        const args = formatArgs(event.command, maxContentLength);
        write(`${timestamp}${pc.dim("→")} ${describeCommand(event.command)}${args ? "\n" + args : ""}`);
        break;
      }

      case "command_end": {
        write(
          `${timestamp}${pc.green("✓")} ${describeCommand(event.command)} ${pc.dim(`(${formatDuration(event.durationMs)})`)}`
        );
        if (verbose && event.change) {
          write(
            boxen(renderDiff(event.change), {
              ...BOX_OPTIONS,
              title: pc.cyan(`CHANGE: ${event.change.path} ${getDiffSummary(event.change)}`),
              borderColor: "cyan",
            })
          );
        }
        break;
      }

      case "command_error": {
        const mark = event.severity === "warning" ? pc.yellow("!") : pc.red("✗");
        const header = `${timestamp}${mark} ${describeCommand(event.command)} ${pc.dim(event.code)}`;
        if (verbose) {
          write(header);
          write(
            boxen(event.message, {
              ...BOX_OPTIONS,
              title: event.severity === "warning" ? pc.yellow("WARNING") : pc.red("ERROR"),
              borderColor: event.severity === "warning" ? "yellow" : "red",
            })
          );
        } else {
          write(`${header}: ${event.message}`);
        }
        break;
      }
    }
  };
}
