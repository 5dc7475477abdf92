/**
 * Tests for project configuration
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import {
  findProjectConfig,
  loadProjectConfigFile,
  resolveEffectiveConfig,
  type FoundProjectConfig,
} from "./project.js";

describe("loadProjectConfigFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "project-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("parses every key", async () => {
    const configPath = path.join(tempDir, "memfs.config.yaml");
    await fs.writeFile(
      configPath,
      "memoryDir: ./data\nprefix: /agent\natomicWrites: false\ntrace: full\n"
    );

    expect(await loadProjectConfigFile(configPath)).toEqual({
      memoryDir: "./data",
      prefix: "/agent",
      atomicWrites: false,
      trace: "full",
    });
  });

  it("treats an empty file as no settings", async () => {
    const configPath = path.join(tempDir, "memfs.config.yaml");
    await fs.writeFile(configPath, "");

    expect(await loadProjectConfigFile(configPath)).toEqual({});
  });

  it("rejects unknown keys and bad values", async () => {
    const configPath = path.join(tempDir, "memfs.config.yaml");

    await fs.writeFile(configPath, "memoryDirectory: ./data\n");
    await expect(loadProjectConfigFile(configPath)).rejects.toThrow(`Invalid project config in ${configPath}`);

    await fs.writeFile(configPath, "trace: loud\n");
    await expect(loadProjectConfigFile(configPath)).rejects.toThrow("  - trace: ");
  });
});

describe("findProjectConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "find-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds the config in a parent directory", async () => {
    await fs.writeFile(path.join(tempDir, "memfs.config.yml"), "memoryDir: ./data\n");
    const nested = path.join(tempDir, "a", "b");
    await fs.mkdir(nested, { recursive: true });

    const found = await findProjectConfig(nested);

    expect(found).toEqual({
      config: { memoryDir: "./data" },
      configPath: path.join(tempDir, "memfs.config.yml"),
      projectRoot: tempDir,
    });
  });

  it("prefers .yaml over .yml in the same directory", async () => {
    await fs.writeFile(path.join(tempDir, "memfs.config.yaml"), "trace: quiet\n");
    await fs.writeFile(path.join(tempDir, "memfs.config.yml"), "trace: debug\n");

    const found = await findProjectConfig(tempDir);

    expect(found?.config).toEqual({ trace: "quiet" });
  });

  it("surfaces a broken config instead of skipping it", async () => {
    await fs.writeFile(path.join(tempDir, "memfs.config.yaml"), "atomicWrites: maybe\n");

    await expect(findProjectConfig(tempDir)).rejects.toThrow("Invalid project config");
  });
});

describe("resolveEffectiveConfig", () => {
  const cwd = path.resolve("/work/project/sub");
  const project: FoundProjectConfig = {
    config: { memoryDir: "data", prefix: "/agent", atomicWrites: false, trace: "full" },
    configPath: path.resolve("/work/project/memfs.config.yaml"),
    projectRoot: path.resolve("/work/project"),
  };

  it("falls back to defaults", () => {
    expect(resolveEffectiveConfig({ cwd })).toEqual({
      root: path.join(cwd, "memories"),
      prefix: "/memories",
      atomicWrites: true,
      trace: "summary",
      configPath: undefined,
    });
  });

  it("resolves the file's memoryDir against the file's directory", () => {
    expect(resolveEffectiveConfig({ cwd, project })).toEqual({
      root: path.resolve("/work/project/data"),
      prefix: "/agent",
      atomicWrites: false,
      trace: "full",
      configPath: project.configPath,
    });
  });

  it("lets the environment override the file", () => {
    const config = resolveEffectiveConfig({
      cwd,
      project,
      env: { MEMORY_DIR: "env-memories", MEMFS_TRACE: "debug" },
    });

    expect(config.root).toBe(path.join(cwd, "env-memories"));
    expect(config.trace).toBe("debug");
  });

  it("lets flags override everything", () => {
    const config = resolveEffectiveConfig({
      cwd,
      project,
      env: { MEMORY_DIR: "env-memories", MEMFS_TRACE: "debug" },
      cli: { root: "/abs/memories", prefix: "/cli", trace: "quiet", atomicWrites: true },
    });

    expect(config).toMatchObject({
      root: path.resolve("/abs/memories"),
      prefix: "/cli",
      trace: "quiet",
      atomicWrites: true,
    });
  });

  it("ignores empty environment values", () => {
    const config = resolveEffectiveConfig({ cwd, env: { MEMORY_DIR: "", MEMFS_TRACE: "" } });

    expect(config.root).toBe(path.join(cwd, "memories"));
    expect(config.trace).toBe("summary");
  });

  it("rejects unknown trace levels with their source", () => {
    expect(() => resolveEffectiveConfig({ cwd, env: { MEMFS_TRACE: "loud" } })).toThrow(
      'Invalid trace level "loud" from MEMFS_TRACE: expected one of quiet, summary, full, debug'
    );
    expect(() => resolveEffectiveConfig({ cwd, cli: { trace: "loud" } })).toThrow(
      'Invalid trace level "loud" from --trace'
    );
  });
});
