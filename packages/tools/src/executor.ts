import { randomUUID } from "node:crypto";
import { createLogger, errorMessage, type ObservabilityDispatcher, type ToolDefinition } from "@schema-scout/core";
import { SandboxViolation, type SandboxBoundary } from "./errors.js";

const logger = createLogger("executor");

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_OUTPUT_CHARS = 10_000;

export interface ToolExecResult {
  invocationId: string;
  result: string;
  error?: string;
  /** Set when the call was refused by the capability sandbox. */
  violation?: { boundary: SandboxBoundary; target: string };
  durationMs: number;
}

export interface ToolExecutionOptions {
  /** Receives tool.start / tool.end / tool.error for the call. */
  dispatcher?: ObservabilityDispatcher;
}

export type ToolExecutor = (name: string, args: Record<string, unknown>) => Promise<ToolExecResult>;

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + `\n\n[...truncated at ${maxChars} chars]`;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, toolName: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Tool "${toolName}" timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Validate, run and time one tool call under a fresh invocation id.
 * Failures come back as `error` on the result; the call itself never rejects.
 */
export async function executeTool(
  tool: ToolDefinition,
  args: Record<string, unknown>,
  options: ToolExecutionOptions = {},
): Promise<ToolExecResult> {
  const { dispatcher } = options;
  const invocationId = randomUUID();
  const timeoutMs = tool.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxOutputChars = tool.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  const start = Date.now();

  dispatcher?.toolStart({ invocationId, toolName: tool.name, arguments: args });

  try {
    const parsed = tool.parameters.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Invalid arguments: ${parsed.error.issues.map((i) => i.message).join(", ")}`);
    }

    const raw = await withTimeout(tool.execute(parsed.data), timeoutMs, tool.name);
    const result = truncate(String(raw), maxOutputChars);

    dispatcher?.toolEnd({ invocationId, toolName: tool.name, output: result });
    return { invocationId, result, durationMs: Date.now() - start };
  } catch (err) {
    dispatcher?.toolError({ invocationId, toolName: tool.name, error: err });
    const failed: ToolExecResult = {
      invocationId,
      result: "",
      error: errorMessage(err),
      durationMs: Date.now() - start,
    };
    if (err instanceof SandboxViolation) {
      logger.warn(`${tool.name}: ${err.message}`);
      failed.violation = { boundary: err.boundary, target: err.target };
    }
    return failed;
  }
}

export function createToolExecutor(
  getToolFn: (name: string) => ToolDefinition | undefined,
  options: ToolExecutionOptions = {},
): ToolExecutor {
  return async (name, args) => {
    const tool = getToolFn(name);
    if (!tool) {
      return {
        invocationId: randomUUID(),
        result: "",
        error: `Unknown tool: "${name}"`,
        durationMs: 0,
      };
    }
    return executeTool(tool, args, options);
  };
}
