import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, createLogger, runObserved, type TokenSummary } from "@schema-scout/core";
import type { SandboxBoundary } from "@schema-scout/tools";
import { bootstrap, type BootstrapOptions } from "./bootstrap.js";

const log = createLogger("replay");

const ReplayStepSchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
});

export const ReplayScriptSchema = z.object({
  /** Reported as the run's inputs on `agent.start`. */
  inputs: z.record(z.unknown()).default({}),
  steps: z.array(ReplayStepSchema).min(1),
});

export type ReplayScript = z.infer<typeof ReplayScriptSchema>;

export interface ReplayStepOutcome {
  tool: string;
  invocationId: string;
  ok: boolean;
  error?: string;
  violation?: { boundary: SandboxBoundary; target: string };
}

export interface ReplayReport {
  runId: string;
  steps: ReplayStepOutcome[];
  tokens: TokenSummary | undefined;
}

export interface ReplayOptions extends BootstrapOptions {
  configPath?: string;
}

export function loadReplayScript(scriptPath: string): ReplayScript {
  let raw: string;
  try {
    raw = readFileSync(scriptPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read replay script: ${scriptPath}`, { cause: err });
  }
  const result = ReplayScriptSchema.safeParse(parseYaml(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid replay script:\n${issues}`);
  }
  return result.data;
}

export function formatReplaySummary(report: ReplayReport): string {
  const failed = report.steps.filter((s) => !s.ok).length;
  const tokens = report.tokens;
  return (
    `run=${report.runId} tools=${report.steps.length} failed=${failed} ` +
    `tokens billable=${tokens?.tokensBillableEstimate ?? 0} successful=${tokens?.tokensSuccessful ?? 0}`
  );
}

/**
 * Execute a scripted sequence of tool calls as one observed run. A failing
 * step is recorded and the script continues; handles still open at the end
 * are closed as cancelled before the run closes.
 */
export async function replay(scriptPath: string, options: ReplayOptions = {}): Promise<ReplayReport> {
  const script = loadReplayScript(scriptPath);
  const scout = bootstrap(options.configPath, options);

  try {
    const { runId, result, tokens } = await runObserved(
      scout.dispatcher,
      async () => {
        const outcomes: ReplayStepOutcome[] = [];
        try {
          for (const step of script.steps) {
            const exec = await scout.executeTool(step.tool, step.args);
            outcomes.push({
              tool: step.tool,
              invocationId: exec.invocationId,
              ok: exec.error === undefined,
              ...(exec.error === undefined ? {} : { error: exec.error }),
              ...(exec.violation ? { violation: exec.violation } : {}),
            });
            if (exec.error !== undefined) log.warn(`${step.tool} failed: ${exec.error}`);
          }
        } finally {
          scout.handles.closeAll("cancelled");
        }
        return outcomes;
      },
      { inputs: script.inputs },
    );

    const report: ReplayReport = { runId, steps: result, tokens };
    log.log(formatReplaySummary(report));
    return report;
  } finally {
    await scout.shutdown();
  }
}
