import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ToolDefinition } from "@schema-scout/core";
import { HandleRegistry } from "../../handles/handle-registry.js";
import { ToolRegistry } from "../../registry.js";
import { CapabilitySandbox, createCapabilityGrant } from "../../sandbox/capability-sandbox.js";
import { CommandRunner, type ExecFileFn } from "../../sandbox/command-runner.js";
import { SandboxedFileSystem } from "../../sandbox/sandboxed-fs.js";
import { createBuiltinTools, registerBuiltinTools } from "../index.js";

describe("built-in tools", () => {
  let root: string;
  let tools: Map<string, ToolDefinition>;
  let handles: HandleRegistry;
  let execFile: ExecFileFn;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "built-in-")));
    mkdirSync(join(root, "out"));
    writeFileSync(join(root, "gateway.jsonl"), '{"msg":"a"}\n{"msg":"b"}\n');
    writeFileSync(join(root, "notes.txt"), "one\ntwo\nthree\n");

    const sandbox = new CapabilitySandbox(
      createCapabilityGrant({
        readableRoots: [root],
        writableRoots: [join(root, "out")],
        executableCommands: ["wc"],
      }),
    );
    const fs = new SandboxedFileSystem(sandbox);
    execFile = vi.fn<ExecFileFn>((_file, _args, _options, callback) => callback(null, "2\n", ""));
    handles = new HandleRegistry(fs);
    const runner = new CommandRunner(sandbox, { execFile });
    tools = new Map(createBuiltinTools({ fs, runner, handles }).map((tool) => [tool.name, tool]));
  });

  afterEach(() => {
    handles.closeAll();
    rmSync(root, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = tools.get(name);
    if (!tool) throw new Error(`missing tool ${name}`);
    return tool.execute(tool.parameters.parse(args));
  }

  it("declares a logging strategy for every tool", () => {
    expect(Object.fromEntries([...tools].map(([name, tool]) => [name, tool.loggingStrategy]))).toEqual({
      file_read: "truncate",
      file_write: "metadata_only",
      file_list: "full",
      line_count: "full",
      run_command: "full",
      jsonl_open: "full",
      jsonl_read: "full",
      jsonl_close: "full",
    });
  });

  it("registers cleanly", () => {
    const sandbox = new CapabilitySandbox(createCapabilityGrant());
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, {
      fs: new SandboxedFileSystem(sandbox),
      runner: new CommandRunner(sandbox),
      handles,
    });
    expect(registry.names()).toHaveLength(8);
  });

  it("file_read returns the head of a file", async () => {
    expect(await call("file_read", { path: "notes.txt", maxLines: 2 })).toBe("one\ntwo");
  });

  it("file_write reports the bytes written", async () => {
    const output = await call("file_write", { path: "out/schema.md", content: "é" });
    expect(output).toBe(`Wrote 2 bytes to ${join(root, "out", "schema.md")}`);
    expect(readFileSync(join(root, "out", "schema.md"), "utf-8")).toBe("é");
  });

  it("file_list formats entries", async () => {
    expect(await call("file_list", {})).toBe(
      ["[.] 3 entries", "[FILE] gateway.jsonl (24B)", "[FILE] notes.txt (14B)", "[DIR]  out/"].join("\n"),
    );
  });

  it("line_count counts lines", async () => {
    expect(await call("line_count", { path: "notes.txt" })).toBe("3");
  });

  it("run_command runs through the sandboxed runner", async () => {
    expect(await call("run_command", { command: "wc", args: ["-l", "notes.txt"] })).toBe("[exit: 0]\n2\n");
    expect(execFile).toHaveBeenCalledTimes(1);
  });

  it("run_command refuses commands outside the grant", async () => {
    await expect(call("run_command", { command: "rm", args: ["notes.txt"] })).rejects.toThrow(
      'Sandbox denied execute of "rm": not in the executable commands',
    );
  });

  it("jsonl tools open, read and close a handle", async () => {
    const opened = await call("jsonl_open", { path: "gateway.jsonl" });
    const id = opened.replace("Handle entry id: ", "");

    expect(JSON.parse(await call("jsonl_read", { handleId: id, numberOfLines: 1 }))).toEqual(['{"msg":"a"}']);
    expect(JSON.parse(await call("jsonl_read", { handleId: id }))).toEqual(['{"msg":"b"}']);
    expect(await call("jsonl_close", { handleId: id })).toBe(`Handle entry id: ${id} closed after 2 lines`);
  });
});
