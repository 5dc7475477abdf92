/**
 * CLI Application
 */

export {
  createTraceFormatter,
  formatDuration,
  type TraceFormatterOptions,
} from "./trace.js";

export {
  runCLI,
  parseRange,
  parseLineIndex,
  parseCommandInput,
  type CLIEnvironment,
} from "./run.js";
