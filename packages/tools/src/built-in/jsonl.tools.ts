import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import { DEFAULT_BATCH_LINES, type HandleRegistry } from "../handles/handle-registry.js";

const openParameters = z.object({
  path: z.string().min(1).describe("A `.jsonl` file under a readable root."),
});

const readParameters = z.object({
  handleId: z.string().min(1).describe("Id returned by jsonl_open."),
  numberOfLines: z
    .number()
    .int()
    .min(1)
    .optional()
    .default(DEFAULT_BATCH_LINES)
    .describe(`Lines to read in this batch (default ${DEFAULT_BATCH_LINES}).`),
});

const closeParameters = z.object({
  handleId: z.string().min(1).describe("Id returned by jsonl_open."),
});

export function createJsonlOpenTool(handles: HandleRegistry): ToolDefinition<typeof openParameters> {
  return {
    name: "jsonl_open",
    description: "Open a JSON-lines log file for batched reading. Returns a handle id for jsonl_read.",
    parameters: openParameters,
    permission: "read",
    loggingStrategy: "full",
    timeoutMs: 30_000,
    execute: async (args) => `Handle entry id: ${await handles.open(args.path)}`,
  };
}

export function createJsonlReadTool(handles: HandleRegistry): ToolDefinition<typeof readParameters> {
  return {
    name: "jsonl_read",
    description:
      "Read the next batch of lines from an open handle, as a JSON array of raw lines. " +
      "An empty array means the end of the file.",
    parameters: readParameters,
    permission: "read",
    loggingStrategy: "full",
    timeoutMs: 30_000,
    maxOutputChars: 200_000,
    execute: async (args) => JSON.stringify(await handles.read(args.handleId, args.numberOfLines)),
  };
}

export function createJsonlCloseTool(handles: HandleRegistry): ToolDefinition<typeof closeParameters> {
  return {
    name: "jsonl_close",
    description: "Close a handle opened by jsonl_open.",
    parameters: closeParameters,
    permission: "read",
    loggingStrategy: "full",
    timeoutMs: 5_000,
    execute: async (args) => {
      const entry = handles.close(args.handleId);
      return `Handle entry id: ${entry.id} closed after ${entry.linesRead} lines`;
    },
  };
}
