import { createLogger } from "../logger.js";
import type { Verbosity } from "../schemas/config.schema.js";
import type { LoggingStrategy } from "../schemas/tool.schema.js";

const logger = createLogger("tool-policy");

/** What a destination gets to see of a tool's arguments and result, least to most. */
export type ToolDetail = "none" | "metadata" | "truncated" | "full";

export const TOOL_DETAIL_RANK: Record<ToolDetail, number> = {
  none: 0,
  metadata: 1,
  truncated: 2,
  full: 3,
};

export const DEFAULT_STRATEGY: LoggingStrategy = "metadata_only";
export const DEFAULT_TRUNCATE_LIMIT = 500;
export const TRUNCATION_MARKER = "...[truncated]";

const STRATEGY_DETAIL: Record<LoggingStrategy, ToolDetail> = {
  full: "full",
  truncate: "truncated",
  metadata_only: "metadata",
};

export interface ToolLoggingPolicyOptions {
  truncateLimit?: number;
}

export class UnknownToolPolicyError extends Error {
  constructor(toolNames: string[]) {
    super(`Logging overrides name unregistered tools: ${toolNames.join(", ")}`);
    this.name = "UnknownToolPolicyError";
  }
}

/**
 * Static per-tool disclosure rules. Verbosity acts as a ceiling override:
 * low hides all tool detail, high shows everything, mid follows the strategy.
 * Tools missing from the table get `metadata_only`.
 */
export class ToolLoggingPolicy {
  private readonly strategies: ReadonlyMap<string, LoggingStrategy>;
  private readonly warnedUnknown = new Set<string>();
  readonly truncateLimit: number;

  constructor(entries: Iterable<readonly [string, LoggingStrategy]>, options: ToolLoggingPolicyOptions = {}) {
    this.strategies = new Map(entries);
    this.truncateLimit = options.truncateLimit ?? DEFAULT_TRUNCATE_LIMIT;
  }

  /**
   * Registered strategies plus config overrides. Overrides may only name
   * registered tools, so a typo fails at startup instead of silently
   * applying the default.
   */
  static fromRegistered(
    registered: Iterable<readonly [string, LoggingStrategy]>,
    overrides: Record<string, LoggingStrategy> = {},
    options: ToolLoggingPolicyOptions = {},
  ): ToolLoggingPolicy {
    const table = new Map(registered);
    const unknown = Object.keys(overrides).filter((name) => !table.has(name));
    if (unknown.length > 0) throw new UnknownToolPolicyError(unknown);
    for (const [name, strategy] of Object.entries(overrides)) table.set(name, strategy);
    return new ToolLoggingPolicy(table, options);
  }

  has(toolName: string): boolean {
    return this.strategies.has(toolName);
  }

  strategyFor(toolName: string): LoggingStrategy {
    const strategy = this.strategies.get(toolName);
    if (strategy) return strategy;
    if (!this.warnedUnknown.has(toolName)) {
      this.warnedUnknown.add(toolName);
      logger.warn(`No logging strategy registered for tool "${toolName}", using ${DEFAULT_STRATEGY}`);
    }
    return DEFAULT_STRATEGY;
  }

  resolve(toolName: string, verbosity: Verbosity): ToolDetail {
    switch (verbosity) {
      case "low":
        return "none";
      case "high":
        return "full";
      case "mid":
        return STRATEGY_DETAIL[this.strategyFor(toolName)];
    }
  }

  /** Shape a tool's arguments for a destination. `undefined` means omit. */
  applyDetail(value: unknown, detail: ToolDetail): unknown {
    switch (detail) {
      case "none":
        return undefined;
      case "metadata":
        return describeShape(value);
      case "truncated":
        return truncateStrings(value, this.truncateLimit);
      case "full":
        return value;
    }
  }

  /** Shape a tool's textual result for a destination. */
  summarizeResult(output: string, detail: ToolDetail): string {
    switch (detail) {
      case "none":
        return "";
      case "metadata":
        return `${byteSize(output)} bytes`;
      case "truncated":
        return truncateString(output, this.truncateLimit);
      case "full":
        return output;
    }
  }
}

export function byteSize(value: unknown): number {
  if (value === undefined) return 0;
  const text = typeof value === "string" ? value : safeStringify(value);
  return Buffer.byteLength(text, "utf-8");
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function typeLabel(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function describeShape(value: unknown): unknown {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    const shape: Record<string, string> = {};
    for (const [key, field] of Object.entries(value)) {
      shape[key] = `<${typeLabel(field)}, ${byteSize(field)} bytes>`;
    }
    return shape;
  }
  return `<${typeLabel(value)}, ${byteSize(value)} bytes>`;
}

function truncateString(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return text.slice(0, limit) + TRUNCATION_MARKER;
}

function truncateStrings(value: unknown, limit: number): unknown {
  if (typeof value === "string") return truncateString(value, limit);
  if (Array.isArray(value)) return value.map((item) => truncateStrings(item, limit));
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      result[key] = truncateStrings(field, limit);
    }
    return result;
  }
  return value;
}
