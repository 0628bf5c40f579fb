import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import type { SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";

const parameters = z.object({
  path: z
    .string()
    .min(1)
    .describe("File path, absolute or relative to the working directory. Must lie under a readable root."),
  maxLines: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe("Return at most this many lines from the start of the file. Omit to read it all."),
});

export function createFileReadTool(fs: SandboxedFileSystem): ToolDefinition<typeof parameters> {
  return {
    name: "file_read",
    description:
      "Read a text file. Use maxLines to peek at the head of large log files; " +
      "use jsonl_open/jsonl_read to walk them in batches instead.",
    parameters,
    permission: "read",
    loggingStrategy: "truncate",
    timeoutMs: 5_000,
    maxOutputChars: 50_000,
    execute: async (args) => fs.readFile(args.path, { maxLines: args.maxLines }),
  };
}
