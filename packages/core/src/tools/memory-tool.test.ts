/**
 * Tests for the memory tool
 */

import { describe, it, expect } from "vitest";
import { MEMORY_TOOL_NAME, createMemoryTool, formatOutcome } from "./memory-tool.js";
import { NoMatchError } from "../sandbox-errors.js";
import type { MemoryCommand } from "../command-schema.js";
import type { AuditRecord, CommandOutcome, MemoryInterpreter } from "../sandbox-types.js";

function auditFor(command: MemoryCommand, outcome: AuditRecord["outcome"]): AuditRecord {
  return {
    command: command.command,
    paths: [],
    outcome,
    timestamp: new Date(0),
    durationMs: 0,
  };
}

/**
 * Records commands and answers with a canned outcome.
 */
class FakeInterpreter implements MemoryInterpreter {
  readonly prefix = "/memories";
  readonly received: MemoryCommand[] = [];

  execute(command: MemoryCommand): CommandOutcome {
    this.received.push(command);
    if (command.command === "str_replace") {
      return {
        ok: false,
        command,
        error: new NoMatchError(command.path, command.old_str),
        audit: auditFor(command, "failure"),
      };
    }
    return { ok: true, command, output: `ran ${command.command}`, audit: auditFor(command, "success") };
  }
}

describe("formatOutcome", () => {
  it("returns the output of a success", () => {
    const command: MemoryCommand = { command: "delete", path: "/memories/a" };
    expect(formatOutcome({ ok: true, command, output: "Deleted file: /memories/a", audit: auditFor(command, "success") })).toBe(
      "Deleted file: /memories/a"
    );
  });

  it("prefixes failures with Error:", () => {
    const command: MemoryCommand = { command: "str_replace", path: "/memories/a", old_str: "x", new_str: "y" };
    const error = new NoMatchError("/memories/a", "x");
    expect(formatOutcome({ ok: false, command, error, audit: auditFor(command, "failure") })).toBe(
      "Error: No replacement was performed: old_str `x` did not appear verbatim in /memories/a."
    );
  });
});

describe("createMemoryTool", () => {
  it("registers under the memory name with the interpreter prefix", () => {
    const memoryTool = createMemoryTool(new FakeInterpreter());

    expect(memoryTool.name).toBe(MEMORY_TOOL_NAME);
    expect(memoryTool.description).toContain("All paths start with /memories.");
  });

  it("relays outcomes through execute", async () => {
    const interpreter = new FakeInterpreter();
    const memoryTool = createMemoryTool(interpreter);

    const output = await memoryTool.execute?.(
      { command: "str_replace", path: "/memories/a.md", old_str: "x", new_str: "y" },
      { toolCallId: "call-1", messages: [] }
    );

    expect(output).toBe(
      "Error: No replacement was performed: old_str `x` did not appear verbatim in /memories/a.md."
    );
    expect(interpreter.received).toHaveLength(1);
  });
});
