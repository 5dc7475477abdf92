/**
 * Project Configuration
 *
 * Schema and loader for memfs.config.yaml, plus the precedence rules that
 * combine it with environment variables and command-line flags.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { DEFAULT_VIRTUAL_PREFIX } from "@memfs/core";

/**
 * Trace levels control output verbosity.
 * - quiet: Command results only
 * - summary: One status line per command
 * - full: Boxed failures and colored diffs of file changes
 * - debug: Full + effective configuration
 */
export const TraceLevelSchema = z.enum(["quiet", "summary", "full", "debug"]);

export type TraceLevel = z.infer<typeof TraceLevelSchema>;

/**
 * Complete project configuration schema.
 */
export const ProjectConfigSchema = z.object({
  /** Memory directory, relative to the config file's directory */
  memoryDir: z.string().min(1).optional(),
  /** Virtual prefix agents address */
  prefix: z.string().startsWith("/").optional(),
  /** Write files through a temp file renamed into place */
  atomicWrites: z.boolean().optional(),
  /** Default trace level */
  trace: TraceLevelSchema.optional(),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * A config file found on disk.
 */
export interface FoundProjectConfig {
  config: ProjectConfig;
  configPath: string;
  projectRoot: string;
}

/**
 * Project configuration file names to look for.
 */
const CONFIG_FILE_NAMES = [
  "memfs.config.yaml",
  "memfs.config.yml",
];

export const DEFAULT_MEMORY_DIR = "./memories";
export const DEFAULT_TRACE_LEVEL: TraceLevel = "summary";

/** Environment variable naming the memory directory. */
export const MEMORY_DIR_ENV = "MEMORY_DIR";
/** Environment variable naming the trace level. */
export const TRACE_ENV = "MEMFS_TRACE";

/**
 * Load project configuration from a YAML file.
 *
 * @throws Error if the file can't be read or does not match the schema
 */
export async function loadProjectConfigFile(configPath: string): Promise<ProjectConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed: unknown = yaml.load(content) ?? {};

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid project config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Find and load project configuration.
 *
 * Searches for memfs.config.yaml in the given directory and its parents.
 * A config file that exists but fails to parse is an error, not a miss.
 */
export async function findProjectConfig(startDir: string): Promise<FoundProjectConfig | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (!(await fileExists(configPath))) continue;

      const config = await loadProjectConfigFile(configPath);
      return { config, configPath, projectRoot: currentDir };
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Options given on the command line.
 */
export interface CLIConfigOverrides {
  root?: string;
  prefix?: string;
  trace?: string;
  atomicWrites?: boolean;
}

/**
 * Configuration after applying defaults, file, environment and flags.
 */
export interface EffectiveConfig {
  /** Absolute memory directory */
  root: string;
  prefix: string;
  atomicWrites: boolean;
  trace: TraceLevel;
  /** Config file that contributed, if any */
  configPath?: string;
}

function parseTraceLevel(value: string, source: string): TraceLevel {
  const result = TraceLevelSchema.safeParse(value);
  if (!result.success) {
    throw new Error(
      `Invalid trace level "${value}" from ${source}: expected one of ${TraceLevelSchema.options.join(", ")}`
    );
  }
  return result.data;
}

/**
 * Merge configuration sources.
 *
 * Flags take precedence over the environment, the environment over the
 * config file, the file over defaults. Paths from the file are relative to
 * its directory; paths from flags and the environment to `cwd`.
 */
export function resolveEffectiveConfig(options: {
  cwd: string;
  project?: FoundProjectConfig | null;
  env?: Record<string, string | undefined>;
  cli?: CLIConfigOverrides;
}): EffectiveConfig {
  const { cwd, project, env = {}, cli = {} } = options;
  const fileConfig = project?.config ?? {};
  const fileBase = project?.projectRoot ?? cwd;

  let root = path.resolve(fileBase, fileConfig.memoryDir ?? DEFAULT_MEMORY_DIR);
  const envRoot = env[MEMORY_DIR_ENV];
  if (envRoot) {
    root = path.resolve(cwd, envRoot);
  }
  if (cli.root) {
    root = path.resolve(cwd, cli.root);
  }

  let trace = fileConfig.trace ?? DEFAULT_TRACE_LEVEL;
  const envTrace = env[TRACE_ENV];
  if (envTrace) {
    trace = parseTraceLevel(envTrace, TRACE_ENV);
  }
  if (cli.trace) {
    trace = parseTraceLevel(cli.trace, "--trace");
  }

  return {
    root,
    prefix: cli.prefix ?? fileConfig.prefix ?? DEFAULT_VIRTUAL_PREFIX,
    atomicWrites: cli.atomicWrites ?? fileConfig.atomicWrites ?? true,
    trace,
    configPath: project?.configPath,
  };
}
