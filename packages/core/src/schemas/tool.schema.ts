import { z } from "zod";

export const ToolPermissionSchema = z.enum(["read", "write", "exec"]);
export type ToolPermission = z.infer<typeof ToolPermissionSchema>;

/**
 * How much of a tool's arguments and results may reach the logs.
 * - `full`          → complete values from mid verbosity up
 * - `truncate`      → string fields capped, marked as truncated
 * - `metadata_only` → only keys, types and sizes below high verbosity
 */
export const LoggingStrategySchema = z.enum(["full", "metadata_only", "truncate"]);
export type LoggingStrategy = z.infer<typeof LoggingStrategySchema>;

export interface ToolDefinition<TParams extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: TParams;
  execute: (args: z.infer<TParams>) => Promise<string>;
  /** Required: tools are registered with an explicit logging strategy. */
  loggingStrategy: LoggingStrategy;
  timeoutMs?: number;
  maxOutputChars?: number;
  permission?: ToolPermission;
}
