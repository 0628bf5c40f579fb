import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import {
  ObservabilityDispatcher,
  ToolLoggingPolicy,
  createMemorySink,
  runWithCorrelation,
  type MemorySink,
  type ToolDefinition,
} from "@schema-scout/core";
import { SandboxViolation } from "../errors.js";
import { createToolExecutor, executeTool } from "../executor.js";

function makeTool(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name: "line_count",
    description: "Test tool",
    parameters: z.object({ path: z.string() }),
    execute: vi.fn(async () => "42"),
    loggingStrategy: "full",
    ...overrides,
  };
}

describe("executeTool", () => {
  let sink: MemorySink;
  let dispatcher: ObservabilityDispatcher;

  beforeEach(() => {
    sink = createMemorySink("mid");
    dispatcher = new ObservabilityDispatcher({
      sinks: [sink],
      policy: new ToolLoggingPolicy([["line_count", "full"]]),
    });
  });

  it("runs the tool with parsed arguments and reports start and end", async () => {
    const tool = makeTool();
    const result = await runWithCorrelation("run_exec", () => executeTool(tool, { path: "a.jsonl" }, { dispatcher }));

    expect(result.result).toBe("42");
    expect(result.error).toBeUndefined();
    expect(tool.execute).toHaveBeenCalledWith({ path: "a.jsonl" });
    expect(sink.events.map((e) => e.kind)).toEqual(["tool.start", "tool.end"]);
    expect(sink.events[1]).toMatchObject({
      invocationId: result.invocationId,
      toolName: "line_count",
      status: "ok",
      resultSummary: "42",
    });
  });

  it("gives every call its own invocation id", async () => {
    const tool = makeTool();
    const [a, b] = await Promise.all([executeTool(tool, { path: "a" }), executeTool(tool, { path: "b" })]);
    expect(a.invocationId).not.toBe(b.invocationId);
  });

  it("returns invalid arguments as an error without running the tool", async () => {
    const tool = makeTool();
    const result = await executeTool(tool, { path: 7 });

    expect(result.error).toBe("Invalid arguments: Expected string, received number");
    expect(tool.execute).not.toHaveBeenCalled();
  });

  it("truncates long output", async () => {
    const tool = makeTool({ maxOutputChars: 5, execute: async () => "abcdefgh" });
    const result = await executeTool(tool, { path: "a" });
    expect(result.result).toBe("abcde\n\n[...truncated at 5 chars]");
  });

  it("times out a tool that never settles", async () => {
    const tool = makeTool({ timeoutMs: 20, execute: () => new Promise<string>(() => {}) });
    const result = await executeTool(tool, { path: "a" });
    expect(result.error).toBe('Tool "line_count" timed out after 20ms');
  });

  it("surfaces sandbox violations and reports tool.error", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const tool = makeTool({
      execute: async () => {
        throw new SandboxViolation("read", "../secret", "outside the readable roots");
      },
    });

    const result = await runWithCorrelation("run_violation", () => executeTool(tool, { path: "../secret" }, { dispatcher }));

    expect(result.violation).toEqual({ boundary: "read", target: "../secret" });
    expect(result.error).toBe('Sandbox denied read of "../secret": outside the readable roots');
    expect(sink.events.map((e) => e.kind)).toEqual(["tool.start", "tool.error"]);
    expect(sink.events[1]).toMatchObject({ errorKind: "SandboxViolation" });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe("createToolExecutor", () => {
  it("looks tools up by name", async () => {
    const tool = makeTool();
    const execute = createToolExecutor((name) => (name === "line_count" ? tool : undefined));

    expect((await execute("line_count", { path: "a" })).result).toBe("42");
    expect((await execute("nope", {})).error).toBe('Unknown tool: "nope"');
  });
});
