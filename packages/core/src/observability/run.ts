import { generateRunId, runWithCorrelation } from "../context/correlation.js";
import type { TokenSummary } from "../ledger/token-ledger.js";
import type { MetricStatus } from "../schemas/metric.schema.js";
import type { ObservabilityDispatcher } from "./dispatcher.js";

export interface ObservedRunOptions {
  /** Reuse an id minted elsewhere; a fresh `run_…` id otherwise. */
  runId?: string;
  inputs?: unknown;
  signal?: AbortSignal;
}

export interface ObservedRunScope {
  runId: string;
  signal?: AbortSignal;
}

export interface ObservedRun<T> {
  runId: string;
  result: T;
  tokens: TokenSummary | undefined;
}

/**
 * Run one agent task inside its own correlation scope, bracketed by
 * `agent.start` and `agent.end`. Work still in flight when the task settles
 * or the signal aborts is closed as cancelled. Task errors propagate
 * unchanged after the run is closed.
 */
export async function runObserved<T>(
  dispatcher: ObservabilityDispatcher,
  task: (scope: ObservedRunScope) => Promise<T>,
  options: ObservedRunOptions = {},
): Promise<ObservedRun<T>> {
  const runId = options.runId ?? generateRunId();
  const { signal } = options;

  return runWithCorrelation(runId, async () => {
    dispatcher.agentStart({ invocationId: runId, inputs: options.inputs });

    const onAbort = (): void => {
      dispatcher.cancelRun(runId);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const result = await task({ runId, signal });
      const status: MetricStatus = signal?.aborted ? "cancelled" : "ok";
      const tokens = dispatcher.agentEnd({ invocationId: runId, outputs: result, status });
      return { runId, result, tokens };
    } catch (err) {
      if (signal?.aborted) {
        dispatcher.agentEnd({ invocationId: runId, status: "cancelled" });
      } else {
        dispatcher.agentError({ invocationId: runId, error: err });
      }
      throw err;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  });
}
