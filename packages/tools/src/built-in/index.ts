import type { ToolDefinition } from "@schema-scout/core";
import type { HandleRegistry } from "../handles/handle-registry.js";
import type { CommandRunner } from "../sandbox/command-runner.js";
import type { SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";
import type { ToolRegistry } from "../registry.js";
import { createFileListTool } from "./file-list.tool.js";
import { createFileReadTool } from "./file-read.tool.js";
import { createFileWriteTool } from "./file-write.tool.js";
import { createJsonlCloseTool, createJsonlOpenTool, createJsonlReadTool } from "./jsonl.tools.js";
import { createLineCountTool } from "./line-count.tool.js";
import { createRunCommandTool } from "./run-command.tool.js";

export interface BuiltinToolDeps {
  fs: SandboxedFileSystem;
  runner: CommandRunner;
  handles: HandleRegistry;
}

export function createBuiltinTools({ fs, runner, handles }: BuiltinToolDeps): ToolDefinition[] {
  return [
    createFileReadTool(fs),
    createFileWriteTool(fs),
    createFileListTool(fs),
    createLineCountTool(fs),
    createRunCommandTool(runner),
    createJsonlOpenTool(handles),
    createJsonlReadTool(handles),
    createJsonlCloseTool(handles),
  ];
}

export function registerBuiltinTools(registry: ToolRegistry, deps: BuiltinToolDeps): void {
  for (const tool of createBuiltinTools(deps)) registry.register(tool);
}
