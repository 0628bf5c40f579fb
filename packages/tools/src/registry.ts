import { LoggingStrategySchema, type LoggingStrategy, type ToolDefinition } from "@schema-scout/core";
import { ToolRegistrationError } from "./errors.js";

const TOOL_NAME = /^[a-z][a-z0-9_]*$/;

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  /** Rejects duplicate names and tools without a declared logging strategy. */
  register(tool: ToolDefinition): void {
    if (!TOOL_NAME.test(tool.name)) {
      throw new ToolRegistrationError(`Tool name "${tool.name}" must be snake_case`);
    }
    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(`Tool "${tool.name}" is already registered`);
    }
    if (!LoggingStrategySchema.safeParse(tool.loggingStrategy).success) {
      throw new ToolRegistrationError(`Tool "${tool.name}" has no valid loggingStrategy`);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): Record<string, ToolDefinition> {
    return Object.fromEntries(this.tools);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** `[name, strategy]` pairs, the input of `ToolLoggingPolicy.fromRegistered`. */
  policyEntries(): Array<[string, LoggingStrategy]> {
    return [...this.tools.values()].map((tool) => [tool.name, tool.loggingStrategy]);
  }
}
