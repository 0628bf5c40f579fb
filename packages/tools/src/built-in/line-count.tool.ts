import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import type { SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";

const parameters = z.object({
  path: z.string().min(1).describe("File whose lines to count."),
});

export function createLineCountTool(fs: SandboxedFileSystem): ToolDefinition<typeof parameters> {
  return {
    name: "line_count",
    description: "Count the lines of a file without returning its content. Use it to plan batch sizes.",
    parameters,
    permission: "read",
    loggingStrategy: "full",
    timeoutMs: 30_000,
    execute: async (args) => String(await fs.lineCount(args.path)),
  };
}
