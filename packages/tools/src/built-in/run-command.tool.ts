import { z } from "zod";
import type { ToolDefinition } from "@schema-scout/core";
import { formatCommandResult, type CommandRunner } from "../sandbox/command-runner.js";

const MAX_TIMEOUT_MS = 120_000;

const parameters = z.object({
  command: z
    .string()
    .min(1)
    .describe("Bare name of a granted command, e.g. `wc`. No paths, no shell syntax."),
  args: z
    .array(z.string())
    .optional()
    .default([])
    .describe("Arguments passed as-is (there is no shell). Path arguments must be readable."),
  workingDirectory: z
    .string()
    .optional()
    .describe("Directory to run in. Must be readable. Defaults to the grant's working directory."),
  timeoutMs: z
    .number()
    .int()
    .min(1000)
    .max(MAX_TIMEOUT_MS)
    .optional()
    .describe(`Command timeout in milliseconds (max ${MAX_TIMEOUT_MS}).`),
});

export function createRunCommandTool(runner: CommandRunner): ToolDefinition<typeof parameters> {
  return {
    name: "run_command",
    description:
      "Run one granted command directly, without a shell, in a filtered environment " +
      "(no API keys exposed). Output starts with `[exit: <code>]`.",
    parameters,
    permission: "exec",
    loggingStrategy: "full",
    timeoutMs: MAX_TIMEOUT_MS + 5_000,
    maxOutputChars: 20_000,
    execute: async (args) => {
      const result = await runner.run(args.command, args.args, {
        cwd: args.workingDirectory,
        timeoutMs: args.timeoutMs,
      });
      return formatCommandResult(result);
    },
  };
}
