import { z } from "zod";
import { LoggingStrategySchema } from "./tool.schema.js";

// Accepts string, null or undefined; null and empty become undefined
const optionalString = z
  .string()
  .nullable()
  .optional()
  .transform((v) => (v ? v : undefined));

export const VerbositySchema = z.enum(["low", "mid", "high"]);

const LoggingConfigSchema = z.object({
  /** Threshold for interactive output. */
  consoleVerbosity: VerbositySchema.default("mid"),
  /** Threshold for the persistent JSON-lines log. Independent of the console. */
  fileVerbosity: VerbositySchema.default("high"),
  fileEnabled: z.boolean().default(true),
  logDir: z.string().default("logs"),
  logFile: z.string().default("schema-scout.jsonl"),
  maxFileBytes: z.number().int().positive().default(10 * 1024 * 1024),
  maxFiles: z.number().int().nonnegative().default(5),
});

export const CapabilityGrantSchema = z.object({
  readableRoots: z.array(z.string().min(1)).readonly().default([]),
  writableRoots: z.array(z.string().min(1)).readonly().default([]),
  executableCommands: z.array(z.string().min(1)).readonly().default([]),
  /** Base for relative paths. Defaults to the first readable root. */
  workingDirectory: optionalString,
});

const SandboxConfigSchema = CapabilityGrantSchema.extend({
  commandTimeoutMs: z.number().int().positive().default(30_000),
});

const ToolsConfigSchema = z.object({
  loggingOverrides: z.record(z.string(), LoggingStrategySchema).default({}),
  /** Max characters kept per string field under the `truncate` strategy. */
  truncateLimit: z.number().int().positive().default(500),
});

const LlmConfigSchema = z.object({
  model: optionalString,
  /** Cost in USD per 1M input (prompt) tokens. */
  costPerMInputTokens: z.number().nonnegative().optional(),
  /** Cost in USD per 1M output (completion) tokens. */
  costPerMOutputTokens: z.number().nonnegative().optional(),
});

export const AppConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  llm: LlmConfigSchema.optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type CapabilityGrantInput = z.input<typeof CapabilityGrantSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type Verbosity = z.infer<typeof VerbositySchema>;
