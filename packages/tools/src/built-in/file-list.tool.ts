import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import type { SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";

const parameters = z.object({
  path: z
    .string()
    .optional()
    .default(".")
    .describe("Directory to list. Defaults to the working directory."),
  pattern: z
    .string()
    .optional()
    .describe("Glob on entry names, e.g. `*.jsonl`. Supports `*` and `?`."),
  filesOnly: z
    .boolean()
    .optional()
    .default(false)
    .describe("If true, leave directories out of the listing."),
});

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}K`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}M`;
}

export function createFileListTool(fs: SandboxedFileSystem): ToolDefinition<typeof parameters> {
  return {
    name: "file_list",
    description:
      "List a directory under a readable root, optionally filtered by a name glob. " +
      "Entries are sorted by name.",
    parameters,
    permission: "read",
    loggingStrategy: "full",
    timeoutMs: 5_000,
    maxOutputChars: 20_000,
    execute: async (args) => {
      const entries = await fs.listDirectory(args.path, { pattern: args.pattern, filesOnly: args.filesOnly });
      const lines = entries.map((entry) =>
        entry.isDirectory ? `[DIR]  ${entry.name}/` : `[FILE] ${entry.name} (${formatSize(entry.size)})`,
      );
      return `[${args.path}] ${entries.length} entries\n${lines.join("\n")}`;
    },
  };
}
