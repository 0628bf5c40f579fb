import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import type { SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";

const parameters = z.object({
  path: z
    .string()
    .min(1)
    .describe("Target file. Its directory must already exist under a writable root."),
  content: z
    .string()
    .describe("The content to write to the file."),
  overwrite: z
    .boolean()
    .optional()
    .default(false)
    .describe("If true, replace an existing file. Defaults to false, which fails on an existing file."),
});

export function createFileWriteTool(fs: SandboxedFileSystem): ToolDefinition<typeof parameters> {
  return {
    name: "file_write",
    description:
      "Write a file (for example a parser or a schema document) under a writable root. " +
      "Refuses to replace an existing file unless overwrite=true.",
    parameters,
    permission: "write",
    loggingStrategy: "metadata_only",
    timeoutMs: 5_000,
    execute: async (args) => {
      const target = await fs.writeFile(args.path, args.content, { overwrite: args.overwrite });
      const bytes = Buffer.byteLength(args.content, "utf-8");
      return `Wrote ${bytes} bytes to ${target}`;
    },
  };
}
