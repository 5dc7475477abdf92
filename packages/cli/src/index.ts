/**
 * memfs - sandboxed memory directory for LLM agents
 */

// Local interpreter
export * from "./sandbox/index.js";

// Configuration
export * from "./config/index.js";

// Terminal rendering
export { renderDiff, getDiffSummary, type DiffRenderOptions } from "./ui/diff-renderer.js";

// CLI
export * from "./cli/index.js";
