#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Runs memory commands against a local memory directory, one subcommand
 * per operation, plus `exec` for raw JSON commands.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import * as fs from "fs/promises";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import {
  formatCommandParseError,
  parseMemoryCommand,
  type MemoryCommand,
} from "@memfs/core";
import { createLocalMemory } from "../sandbox/index.js";
import {
  findProjectConfig,
  resolveEffectiveConfig,
  type EffectiveConfig,
} from "../config/index.js";
import { createTraceFormatter } from "./trace.js";

/**
 * Process surroundings the CLI reads from and writes to.
 */
export interface CLIEnvironment {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
}

/**
 * Global options shared by every subcommand.
 */
type GlobalOptions = {
  root?: string;
  prefix?: string;
  trace?: string;
  atomic: boolean;
};

async function readProcessStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return "";
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

const DEFAULT_ENVIRONMENT: CLIEnvironment = {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readStdin: readProcessStdin,
};

/**
 * Parse "start:end" into a view range ("3:-1" reads to the end).
 */
export function parseRange(value: string): [number, number] {
  const match = /^(\d+):(-?\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected a range like "3:10" or "3:-1".');
  }
  return [Number(match[1]), Number(match[2])];
}

/**
 * Parse a non-negative line index.
 */
export function parseLineIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number(value);
}

/**
 * Split `exec` input into raw command values.
 * Accepts one JSON value (object or array), or one JSON object per line.
 */
export function parseCommandInput(text: string): { values: unknown[]; errors: string[] } {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { values: [], errors: ["No command input given"] };
  }

  try {
    const whole: unknown = JSON.parse(trimmed);
    return { values: Array.isArray(whole) ? whole : [whole], errors: [] };
  } catch {
    // Not a single JSON document; fall back to one command per line.
  }

  const values: unknown[] = [];
  const errors: string[] = [];
  trimmed.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    try {
      values.push(JSON.parse(line));
    } catch (err) {
      errors.push(`Line ${index + 1}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  return { values, errors };
}

function describeConfig(config: EffectiveConfig): string {
  return [
    `root: ${config.root}`,
    `prefix: ${config.prefix}`,
    `atomicWrites: ${config.atomicWrites}`,
    `trace: ${config.trace}`,
    `config: ${config.configPath ?? "(none)"}`,
  ].join("\n");
}

/**
 * Main CLI execution.
 *
 * @returns Process exit code: 0 when every command succeeded, 1 otherwise
 */
export async function runCLI(
  argv: string[] = process.argv,
  environment: Partial<CLIEnvironment> = {}
): Promise<number> {
  const io: CLIEnvironment = { ...DEFAULT_ENVIRONMENT, ...environment };
  let exitCode = 0;

  const program = new Command();

  /**
   * Load configuration, run the commands in order and record the exit code.
   */
  const runCommands = async (commands: MemoryCommand[], inputErrors: string[] = []): Promise<void> => {
    const options = program.opts<GlobalOptions>();
    const project = await findProjectConfig(io.cwd);
    const config = resolveEffectiveConfig({
      cwd: io.cwd,
      project,
      env: io.env,
      cli: {
        root: options.root,
        prefix: options.prefix,
        trace: options.trace,
        atomicWrites: program.getOptionValueSource("atomic") === "cli" ? options.atomic : undefined,
      },
    });

    if (config.trace === "debug") {
      io.stderr(describeConfig(config));
    }

    for (const error of inputErrors) {
      io.stderr(`Error: ${error}`);
      exitCode = 1;
    }

    const memory = createLocalMemory(
      { root: config.root, prefix: config.prefix, atomicWrites: config.atomicWrites },
      { onEvent: createTraceFormatter({ level: config.trace, write: io.stderr }) }
    );

    for (const command of commands) {
      const outcome = memory.execute(command);
      if (outcome.ok) {
        io.stdout(outcome.output);
      } else {
        exitCode = 1;
        if (config.trace === "quiet") {
          io.stderr(`Error: ${outcome.error.toLLMMessage()}`);
        }
      }
    }
  };

  const readText = async (text: string | undefined, file: string | undefined): Promise<string> => {
    if (text !== undefined) return text;
    if (file !== undefined) return fs.readFile(file, "utf-8");
    return io.readStdin();
  };

  program
    .name("memfs")
    .description("Run memory commands against a sandboxed memory directory")
    .version("0.1.0")
    .option("-r, --root <dir>", "Memory directory (overrides MEMORY_DIR and config file)")
    .option("--prefix <prefix>", "Virtual path prefix (default: /memories)")
    .option("-t, --trace <level>", "Trace level: quiet, summary, full, debug")
    .option("--no-atomic", "Overwrite files in place instead of writing a temp file first")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command("view")
    .description("List a directory or show a file with line numbers")
    .argument("<path>", "Virtual path")
    .option("--range <start:end>", "Inclusive line range, end -1 for end of file", parseRange)
    .action(async (path: string, opts: { range?: [number, number] }) => {
      await runCommands([
        opts.range ? { command: "view", path, view_range: opts.range } : { command: "view", path },
      ]);
    });

  program
    .command("create")
    .description("Create or overwrite a file (content from --text, --file or stdin)")
    .argument("<path>", "Virtual path")
    .option("--text <text>", "File content")
    .option("--file <file>", "Read file content from a local file")
    .action(async (path: string, opts: { text?: string; file?: string }) => {
      const fileText = await readText(opts.text, opts.file);
      await runCommands([{ command: "create", path, file_text: fileText }]);
    });

  program
    .command("str-replace")
    .description("Replace text that occurs exactly once in a file")
    .argument("<path>", "Virtual path")
    .requiredOption("--old <text>", "Text to find")
    .requiredOption("--new <text>", "Replacement text")
    .action(async (path: string, opts: { old: string; new: string }) => {
      await runCommands([{ command: "str_replace", path, old_str: opts.old, new_str: opts.new }]);
    });

  program
    .command("insert")
    .description("Insert text before a 0-based line (text from --text, --file or stdin)")
    .argument("<path>", "Virtual path")
    .argument("<line>", "Line index; 0 inserts at the top", parseLineIndex)
    .option("--text <text>", "Text to insert")
    .option("--file <file>", "Read the text from a local file")
    .action(async (path: string, line: number, opts: { text?: string; file?: string }) => {
      const insertText = await readText(opts.text, opts.file);
      await runCommands([{ command: "insert", path, insert_line: line, insert_text: insertText }]);
    });

  program
    .command("delete")
    .description("Delete a file or a directory and its contents")
    .argument("<path>", "Virtual path")
    .action(async (path: string) => {
      await runCommands([{ command: "delete", path }]);
    });

  program
    .command("rename")
    .description("Move a file or directory; the destination must not exist")
    .argument("<old>", "Current virtual path")
    .argument("<new>", "New virtual path")
    .action(async (oldPath: string, newPath: string) => {
      await runCommands([{ command: "rename", old_path: oldPath, new_path: newPath }]);
    });

  program
    .command("exec")
    .description("Run JSON memory commands (argument, or one per line on stdin)")
    .argument("[json]", "A command object or an array of command objects")
    .action(async (json: string | undefined) => {
      const { values, errors } = parseCommandInput(json ?? (await io.readStdin()));
      const commands: MemoryCommand[] = [];
      for (const value of values) {
        const parsed = parseMemoryCommand(value);
        if (parsed.success) {
          commands.push(parsed.command);
        } else {
          errors.push(formatCommandParseError(parsed));
        }
      }
      await runCommands(commands, errors);
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version output exit cleanly; usage errors were already printed.
      return err.exitCode;
    }
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  return exitCode;
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1]);
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
