/**
 * Config Module
 *
 * Project configuration schema, loading and precedence.
 */

export {
  ProjectConfigSchema,
  TraceLevelSchema,
  DEFAULT_MEMORY_DIR,
  DEFAULT_TRACE_LEVEL,
  MEMORY_DIR_ENV,
  TRACE_ENV,
  type ProjectConfig,
  type TraceLevel,
  type FoundProjectConfig,
  type CLIConfigOverrides,
  type EffectiveConfig,
  loadProjectConfigFile,
  findProjectConfig,
  resolveEffectiveConfig,
} from "./project.js";
