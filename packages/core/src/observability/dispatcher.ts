import { currentRunId, runWithCorrelation } from "../context/correlation.js";
import { bestEffort } from "../best-effort.js";
import { MissingCorrelationError, errorKind, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { TokenLedger, type TokenSummary, type TokenUsage } from "../ledger/token-ledger.js";
import { createMetricEvent, monotonicTimestamp } from "../metrics/events.js";
import { emitMetric, type MetricSink } from "../metrics/sinks.js";
import { ToolLoggingPolicy, byteSize } from "../policy/tool-logging-policy.js";
import type { MetricEvent, MetricStatus } from "../schemas/metric.schema.js";
import {
  LifecycleNotificationSchema,
  LifecyclePayloadSchemas,
  isLifecycleRoute,
  type LifecycleEmitter,
  type LifecycleKind,
  type LifecycleNotification,
} from "./lifecycle-events.js";

const logger = createLogger("dispatcher");

const SUMMARY_CHARS = 200;

/** How many cancelled invocations are remembered so their late terminal events can be dropped. */
const CANCELLED_MEMORY = 1024;

export interface LlmStartInput { invocationId: string; model: string; modelVersion?: string; prompt?: unknown }
export interface LlmUsageInput { invocationId: string; tokensPrompt: number; tokensCompletion: number; succeeded?: boolean }
export interface LlmEndInput { invocationId: string; status?: MetricStatus }
export interface LlmErrorInput { invocationId: string; error?: unknown; usage?: TokenUsage }
export interface ToolStartInput { invocationId: string; toolName: string; arguments?: unknown }
export interface ToolEndInput { invocationId: string; toolName?: string; output?: string; status?: MetricStatus }
export interface ToolErrorInput { invocationId: string; toolName?: string; error?: unknown }
export interface AgentStartInput { invocationId: string; inputs?: unknown }
export interface AgentEndInput { invocationId: string; outputs?: unknown; status?: MetricStatus }
export interface AgentErrorInput { invocationId: string; error?: unknown }
export interface AgentActionInput { toolName: string; toolInput?: unknown }
export interface AgentFinishInput { output?: unknown }
export interface BatchStartInput { invocationId: string; batchNumber: number; plannedLines: number }
export interface BatchEndInput { invocationId: string; linesRead: number; cumulativeLines: number; status?: MetricStatus }
export interface BatchDiscoveryInput { batchNumber: number; newLogTypes: number; newFields: number }
export interface HandleOpenInput { handleId: string; path: string; totalLines?: number }
export interface HandleCloseInput { handleId: string; linesRead: number; status?: MetricStatus }

interface InFlight {
  kind: LifecycleKind;
  invocationId: string;
  runId: string;
  startedAt: number;
  toolName?: string;
  batchNumber?: number;
}

export interface DispatcherOptions {
  sinks: MetricSink[];
  policy: ToolLoggingPolicy;
  ledger?: TokenLedger;
  /** Millisecond clock used for durations. */
  now?: () => number;
}

/** Keys and byte sizes of a run's inputs or outputs; non-objects are reported under `defaultKey`. */
export function describeData(data: unknown, defaultKey: string): { keys: string[]; sizes: Record<string, number> } {
  if (data !== null && typeof data === "object" && !Array.isArray(data)) {
    const sizes: Record<string, number> = {};
    for (const [key, value] of Object.entries(data)) sizes[key] = byteSize(value);
    return { keys: Object.keys(sizes), sizes };
  }
  if (data === undefined) return { keys: [], sizes: {} };
  return { keys: [defaultKey], sizes: { [defaultKey]: byteSize(data) } };
}

function summarize(value: unknown): string {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? "";
  return text.length > SUMMARY_CHARS ? text.slice(0, SUMMARY_CHARS) : text;
}

/**
 * Turns lifecycle notifications from the orchestration layer into metric
 * events. The only place that reads the active run, consults the tool
 * logging policy, builds events and feeds the token ledger.
 *
 * Every public handler is an error boundary: a failure inside it is
 * reported as an observability failure and never reaches the caller.
 */
export class ObservabilityDispatcher {
  readonly ledger: TokenLedger;
  readonly policy: ToolLoggingPolicy;
  private readonly sinks: MetricSink[];
  private readonly now: () => number;
  private readonly inFlight = new Map<string, InFlight>();
  private readonly iterations = new Map<string, number>();
  private readonly cancelled = new Set<string>();

  constructor(options: DispatcherOptions) {
    this.sinks = [...options.sinks];
    this.policy = options.policy;
    this.ledger = options.ledger ?? new TokenLedger();
    this.now = options.now ?? (() => performance.now());
  }

  // ─── Routing ──────────────────────────────────────────────────────

  /** Subscribe to an orchestration emitter. Returns the unsubscribe function. */
  attach(emitter: LifecycleEmitter): () => void {
    const listener = (notification: LifecycleNotification): void => this.notify(notification);
    emitter.on("notification", listener);
    return () => {
      emitter.off("notification", listener);
    };
  }

  notify(notification: LifecycleNotification): void {
    this.guard("notify", () => {
      const { invocationId, kind, phase, payload } = LifecycleNotificationSchema.parse(notification);
      const route = `${kind}.${phase}`;
      if (!isLifecycleRoute(route)) {
        throw new Error(`No handler for ${route} notifications`);
      }
      const schemas = LifecyclePayloadSchemas;
      switch (route) {
        case "llm.start": return this.llmStart({ invocationId, ...schemas[route].parse(payload) });
        case "llm.usage": return this.llmUsage({ invocationId, ...schemas[route].parse(payload) });
        case "llm.end": return this.llmEnd({ invocationId, ...schemas[route].parse(payload) });
        case "llm.error": return this.llmError({ invocationId, ...schemas[route].parse(payload) });
        case "tool.start": return this.toolStart({ invocationId, ...schemas[route].parse(payload) });
        case "tool.end": return this.toolEnd({ invocationId, ...schemas[route].parse(payload) });
        case "tool.error": return this.toolError({ invocationId, ...schemas[route].parse(payload) });
        case "agent.start": return this.agentStart({ invocationId, ...schemas[route].parse(payload) });
        case "agent.end": {
          this.agentEnd({ invocationId, ...schemas[route].parse(payload) });
          return;
        }
        case "agent.error": {
          this.agentError({ invocationId, ...schemas[route].parse(payload) });
          return;
        }
        case "agent.action": return this.agentAction(schemas[route].parse(payload));
        case "agent.finish": return this.agentFinish(schemas[route].parse(payload));
        case "batch.start": return this.batchStart({ invocationId, ...schemas[route].parse(payload) });
        case "batch.end": return this.batchEnd({ invocationId, ...schemas[route].parse(payload) });
        case "batch.discovery": return this.batchDiscovery(schemas[route].parse(payload));
        case "handle.start": return this.handleOpen({ handleId: invocationId, ...schemas[route].parse(payload) });
        case "handle.end": return this.handleClose({ handleId: invocationId, ...schemas[route].parse(payload) });
      }
    });
  }

  // ─── LLM ──────────────────────────────────────────────────────────

  llmStart(input: LlmStartInput): void {
    this.guard("llm.start", () => {
      const runId = this.requireRun("llm.start");
      this.track({ kind: "llm", invocationId: input.invocationId, runId, startedAt: this.now() });
      this.emitAll(() => createMetricEvent("llm.start", {
        model: input.model,
        ...(input.modelVersion ? { modelVersion: input.modelVersion } : {}),
        promptSizeBytes: byteSize(input.prompt),
      }, this.envelope(runId)));
    });
  }

  llmUsage(input: LlmUsageInput): void {
    this.guard("llm.usage", () => {
      const runId = this.requireRun("llm.usage");
      if (this.wasCancelled("llm", input.invocationId, runId)) return;
      this.recordUsage(runId, input, input.succeeded ?? true);
    });
  }

  llmEnd(input: LlmEndInput): void {
    this.guard("llm.end", () => {
      const runId = this.requireRun("llm.end");
      if (this.dropLate("llm", input.invocationId, runId)) return;
      const started = this.untrack("llm", input.invocationId);
      this.emitAll(() => createMetricEvent("llm.end", {
        status: input.status ?? "ok",
        durationMs: this.elapsed(started),
      }, this.envelope(runId)));
    });
  }

  llmError(input: LlmErrorInput): void {
    this.guard("llm.error", () => {
      const runId = this.requireRun("llm.error");
      if (this.dropLate("llm", input.invocationId, runId)) return;
      this.untrack("llm", input.invocationId);
      if (input.usage) this.recordUsage(runId, input.usage, false);
      this.emitAll(() => createMetricEvent("llm.error", {
        errorKind: errorKind(input.error),
        message: errorMessage(input.error),
      }, this.envelope(runId)));
    });
  }

  // ─── Tools ────────────────────────────────────────────────────────

  toolStart(input: ToolStartInput): void {
    this.guard("tool.start", () => {
      const runId = this.requireRun("tool.start");
      const { toolName } = input;
      this.track({ kind: "tool", invocationId: input.invocationId, runId, startedAt: this.now(), toolName });
      const inputSizeBytes = byteSize(input.arguments);
      this.emitAll((sink) => {
        const shown = this.policy.applyDetail(input.arguments, this.policy.resolve(toolName, sink.verbosity));
        return createMetricEvent("tool.start", {
          toolName,
          invocationId: input.invocationId,
          inputSizeBytes,
          ...(shown === undefined ? {} : { arguments: shown }),
        }, this.envelope(runId));
      });
    });
  }

  toolEnd(input: ToolEndInput): void {
    this.guard("tool.end", () => {
      const runId = this.requireRun("tool.end");
      if (this.dropLate("tool", input.invocationId, runId)) return;
      const started = this.untrack("tool", input.invocationId);
      const toolName = started?.toolName ?? input.toolName ?? "unknown";
      const output = input.output ?? "";
      const durationMs = this.elapsed(started);
      this.emitAll((sink) => createMetricEvent("tool.end", {
        toolName,
        invocationId: input.invocationId,
        status: input.status ?? "ok",
        durationMs,
        outputSizeBytes: byteSize(output),
        resultSummary: this.policy.summarizeResult(output, this.policy.resolve(toolName, sink.verbosity)),
      }, this.envelope(runId)));
    });
  }

  toolError(input: ToolErrorInput): void {
    this.guard("tool.error", () => {
      const runId = this.requireRun("tool.error");
      if (this.dropLate("tool", input.invocationId, runId)) return;
      const started = this.untrack("tool", input.invocationId);
      this.emitAll(() => createMetricEvent("tool.error", {
        toolName: started?.toolName ?? input.toolName ?? "unknown",
        invocationId: input.invocationId,
        errorKind: errorKind(input.error),
        message: errorMessage(input.error),
      }, this.envelope(runId)));
    });
  }

  // ─── Agent run ────────────────────────────────────────────────────

  agentStart(input: AgentStartInput): void {
    this.guard("agent.start", () => {
      const runId = this.requireRun("agent.start");
      this.track({ kind: "agent", invocationId: input.invocationId, runId, startedAt: this.now() });
      const { keys, sizes } = describeData(input.inputs, "input");
      this.emitAll(() => createMetricEvent("agent.start", { inputKeys: keys, inputSizes: sizes }, this.envelope(runId)));
    });
  }

  /**
   * Close the run: terminate anything still in flight as cancelled, emit
   * the run outcome and token totals, then drop the run's ledger entries.
   * Returns the token totals.
   */
  agentEnd(input: AgentEndInput): TokenSummary | undefined {
    return this.guard("agent.end", () => {
      const runId = this.requireRun("agent.end");
      const started = this.untrack("agent", input.invocationId);
      const durationMs = this.elapsed(started);
      this.cancelRun(runId);

      const { keys, sizes } = describeData(input.outputs, "output");
      this.emitAll(() => createMetricEvent("agent.end", {
        status: input.status ?? "ok",
        durationMs,
        outputKeys: keys,
        outputSizes: sizes,
      }, this.envelope(runId)));

      const summary = this.ledger.summarize(runId);
      this.emitAll(() => createMetricEvent("agent.token_summary", {
        tokensBillableEstimate: summary.tokensBillableEstimate,
        tokensSuccessful: summary.tokensSuccessful,
        ...(summary.estimatedCostUsd === undefined ? {} : { estimatedCostUsd: summary.estimatedCostUsd }),
      }, this.envelope(runId)));

      this.ledger.reset(runId);
      this.iterations.delete(runId);
      return summary;
    });
  }

  agentError(input: AgentErrorInput): TokenSummary | undefined {
    const summary = this.agentEnd({ invocationId: input.invocationId, status: "error" });
    this.guard("agent.error", () => {
      logger.error(`Run ended with ${errorKind(input.error)}: ${errorMessage(input.error)}`);
    });
    return summary;
  }

  /** Reasoning trace: one step in which the agent chose a tool. */
  agentAction(input: AgentActionInput): void {
    this.guard("agent.action", () => {
      const runId = this.requireRun("agent.action");
      const iterationNumber = this.nextIteration(runId);
      this.emitAll(() => createMetricEvent("agent.iteration", {
        iterationNumber,
        actionKind: "tool_call",
        actionSummary: summarize(`${input.toolName}: ${summarize(input.toolInput)}`),
        observationSummary: "",
      }, this.envelope(runId)));
    });
  }

  agentFinish(input: AgentFinishInput): void {
    this.guard("agent.finish", () => {
      const runId = this.requireRun("agent.finish");
      const iterationNumber = this.nextIteration(runId);
      this.emitAll(() => createMetricEvent("agent.iteration", {
        iterationNumber,
        actionKind: "finish",
        actionSummary: "",
        observationSummary: summarize(input.output),
      }, this.envelope(runId)));
    });
  }

  // ─── Batches & handles ────────────────────────────────────────────

  batchStart(input: BatchStartInput): void {
    this.guard("batch.start", () => {
      const runId = this.requireRun("batch.start");
      this.track({
        kind: "batch",
        invocationId: input.invocationId,
        runId,
        startedAt: this.now(),
        batchNumber: input.batchNumber,
      });
      this.emitAll(() => createMetricEvent("batch.start", {
        batchNumber: input.batchNumber,
        plannedLines: input.plannedLines,
      }, this.envelope(runId)));
    });
  }

  batchEnd(input: BatchEndInput): void {
    this.guard("batch.end", () => {
      const runId = this.requireRun("batch.end");
      if (this.dropLate("batch", input.invocationId, runId)) return;
      const started = this.untrack("batch", input.invocationId);
      if (!started?.batchNumber) {
        throw new Error(`batch.end for ${input.invocationId} has no matching batch.start`);
      }
      const { batchNumber } = started;
      this.emitAll(() => createMetricEvent("batch.end", {
        batchNumber,
        status: input.status ?? "ok",
        linesRead: input.linesRead,
        cumulativeLines: input.cumulativeLines,
        durationMs: this.elapsed(started),
      }, this.envelope(runId)));
    });
  }

  batchDiscovery(input: BatchDiscoveryInput): void {
    this.guard("batch.discovery", () => {
      const runId = this.requireRun("batch.discovery");
      this.emitAll(() => createMetricEvent("batch.discovery", { ...input }, this.envelope(runId)));
    });
  }

  handleOpen(input: HandleOpenInput): void {
    this.guard("handle.open", () => {
      const runId = this.requireRun("handle.open");
      this.track({ kind: "handle", invocationId: input.handleId, runId, startedAt: this.now() });
      this.emitAll(() => createMetricEvent("handle.open", {
        handleId: input.handleId,
        path: input.path,
        ...(input.totalLines === undefined ? {} : { totalLines: input.totalLines }),
      }, this.envelope(runId)));
    });
  }

  handleClose(input: HandleCloseInput): void {
    this.guard("handle.close", () => {
      const runId = this.requireRun("handle.close");
      if (this.dropLate("handle", input.handleId, runId)) return;
      const started = this.untrack("handle", input.handleId);
      this.emitAll(() => createMetricEvent("handle.close", {
        handleId: input.handleId,
        status: input.status ?? "ok",
        linesRead: input.linesRead,
        durationMs: this.elapsed(started),
      }, this.envelope(runId)));
    });
  }

  // ─── Cancellation ─────────────────────────────────────────────────

  /**
   * Emit a `cancelled` terminal event for every LLM call, tool call, batch
   * and handle of the run that started and never finished. A terminal
   * notification that arrives for one of them afterwards is dropped.
   */
  cancelRun(runId: string): number {
    const pending = [...this.inFlight.entries()].filter(
      ([, entry]) => entry.runId === runId && entry.kind !== "agent",
    );
    for (const [key, entry] of pending) {
      this.inFlight.delete(key);
      this.rememberCancelled(`${runId}|${key}`);
      this.guard(`cancel ${entry.kind}`, () => runWithCorrelation(runId, () => this.emitCancelled(entry)));
    }
    return pending.length;
  }

  inFlightCount(runId?: string): number {
    let n = 0;
    for (const entry of this.inFlight.values()) {
      if (runId === undefined || entry.runId === runId) n++;
    }
    return n;
  }

  private emitCancelled(entry: InFlight): void {
    const durationMs = this.elapsed(entry);
    const envelope = this.envelope(entry.runId);
    switch (entry.kind) {
      case "llm":
        this.emitAll(() => createMetricEvent("llm.end", { status: "cancelled", durationMs }, envelope));
        break;
      case "tool": {
        const toolName = entry.toolName ?? "unknown";
        this.emitAll(() => createMetricEvent("tool.end", {
          toolName,
          invocationId: entry.invocationId,
          status: "cancelled",
          durationMs,
          outputSizeBytes: 0,
          resultSummary: "",
        }, envelope));
        break;
      }
      case "batch": {
        const batchNumber = entry.batchNumber ?? 1;
        this.emitAll(() => createMetricEvent("batch.end", {
          batchNumber,
          status: "cancelled",
          linesRead: 0,
          cumulativeLines: 0,
          durationMs,
        }, envelope));
        break;
      }
      case "handle":
        this.emitAll(() => createMetricEvent("handle.close", {
          handleId: entry.invocationId,
          status: "cancelled",
          linesRead: 0,
          durationMs,
        }, envelope));
        break;
      case "agent":
        break;
    }
  }

  // ─── Internals ────────────────────────────────────────────────────

  private guard<T>(where: string, fn: () => T): T | undefined {
    return bestEffort(`dispatcher ${where}`, fn);
  }

  private requireRun(kind: string): string {
    const runId = currentRunId();
    if (!runId) throw new MissingCorrelationError(kind);
    return runId;
  }

  private envelope(runId: string): { runId: string; timestamp: string } {
    return { runId, timestamp: monotonicTimestamp() };
  }

  private key(kind: LifecycleKind, invocationId: string): string {
    return `${kind}:${invocationId}`;
  }

  private track(entry: InFlight): void {
    const key = this.key(entry.kind, entry.invocationId);
    if (this.inFlight.has(key)) {
      logger.debug(`Duplicate start for ${key}; restarting its clock`);
    }
    this.inFlight.set(key, entry);
  }

  private untrack(kind: LifecycleKind, invocationId: string): InFlight | undefined {
    const key = this.key(kind, invocationId);
    const entry = this.inFlight.get(key);
    if (!entry) {
      logger.debug(`No start recorded for ${key}; duration reported as 0`);
      return undefined;
    }
    this.inFlight.delete(key);
    return entry;
  }

  private rememberCancelled(key: string): void {
    this.cancelled.add(key);
    if (this.cancelled.size <= CANCELLED_MEMORY) return;
    for (const oldest of this.cancelled) {
      this.cancelled.delete(oldest);
      break;
    }
  }

  private wasCancelled(kind: LifecycleKind, invocationId: string, runId: string): boolean {
    return this.cancelled.has(`${runId}|${this.key(kind, invocationId)}`);
  }

  /** True when the invocation was already closed as cancelled; consumes the record. */
  private dropLate(kind: LifecycleKind, invocationId: string, runId: string): boolean {
    const key = `${runId}|${this.key(kind, invocationId)}`;
    if (!this.cancelled.delete(key)) return false;
    logger.debug(`Dropping late terminal event for cancelled ${key}`);
    return true;
  }

  private elapsed(started: InFlight | undefined): number {
    if (!started) return 0;
    return Math.max(0, this.now() - started.startedAt);
  }

  private nextIteration(runId: string): number {
    const next = (this.iterations.get(runId) ?? 0) + 1;
    this.iterations.set(runId, next);
    return next;
  }

  private recordUsage(runId: string, usage: TokenUsage, succeeded: boolean): void {
    this.ledger.record(runId, usage, succeeded);
    this.emitAll(() => createMetricEvent("llm.usage", {
      tokensPrompt: usage.tokensPrompt,
      tokensCompletion: usage.tokensCompletion,
      tokensTotal: usage.tokensPrompt + usage.tokensCompletion,
    }, this.envelope(runId)));
  }

  /** Build one event per sink (detail may differ per verbosity) and emit each. */
  private emitAll(build: (sink: MetricSink) => MetricEvent): void {
    for (const sink of this.sinks) {
      bestEffort(`build event for ${sink.name}`, () => emitMetric(build(sink), sink));
    }
  }
}
