export { ToolRegistry } from "./registry.js";
export { executeTool, createToolExecutor } from "./executor.js";
export type { ToolExecResult, ToolExecutionOptions, ToolExecutor } from "./executor.js";
export { SandboxViolation, ToolRegistrationError } from "./errors.js";
export type { SandboxBoundary } from "./errors.js";

// Sandbox
export { CapabilitySandbox, createCapabilityGrant } from "./sandbox/capability-sandbox.js";
export type { CapabilityGrant, SandboxDecision, AuthorizedCommand } from "./sandbox/capability-sandbox.js";
export { SandboxedFileSystem } from "./sandbox/sandboxed-fs.js";
export type { DirectoryEntry, LineReader, WriteOptions } from "./sandbox/sandboxed-fs.js";
export { CommandRunner, createSafeEnv, formatCommandResult } from "./sandbox/command-runner.js";
export type { CommandResult, CommandRunnerOptions, ExecFileFn, RunOptions } from "./sandbox/command-runner.js";

// Handles
export { HandleRegistry, UnknownHandleError, DEFAULT_BATCH_LINES } from "./handles/handle-registry.js";
export type { HandleEntry, HandleRegistryOptions } from "./handles/handle-registry.js";

// Built-in tools
export { createBuiltinTools, registerBuiltinTools } from "./built-in/index.js";
export type { BuiltinToolDeps } from "./built-in/index.js";
export { createFileReadTool } from "./built-in/file-read.tool.js";
export { createFileWriteTool } from "./built-in/file-write.tool.js";
export { createFileListTool } from "./built-in/file-list.tool.js";
export { createLineCountTool } from "./built-in/line-count.tool.js";
export { createRunCommandTool } from "./built-in/run-command.tool.js";
export { createJsonlOpenTool, createJsonlReadTool, createJsonlCloseTool } from "./built-in/jsonl.tools.js";
