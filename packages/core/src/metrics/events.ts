import { currentRunId } from "../context/correlation.js";
import { CorrelationConflictError, MissingCorrelationError } from "../errors.js";
import type { LogLevel } from "../logger.js";
import {
  MetricEventSchema,
  type MetricEvent,
  type MetricEventOf,
  type MetricFields,
  type MetricKind,
} from "../schemas/metric.schema.js";

let lastTimestampMs = 0;

/** ISO timestamp that never goes backwards within this process, even if the wall clock does. */
export function monotonicTimestamp(): string {
  const now = Math.max(Date.now(), lastTimestampMs);
  lastTimestampMs = now;
  return new Date(now).toISOString();
}

export interface MetricEnvelope {
  /** Defaults to the active run. Must match it when both are present. */
  runId?: string;
  timestamp?: string;
}

function isKind<K extends MetricKind>(event: MetricEvent, kind: K): event is MetricEventOf<K> {
  return event.kind === kind;
}

/**
 * Build and validate an event. Throws on malformed fields or when no run id
 * can be attributed, so bad events fail here rather than at emission.
 */
export function createMetricEvent<K extends MetricKind>(
  kind: K,
  fields: MetricFields<K>,
  envelope: MetricEnvelope = {},
): MetricEventOf<K> {
  const active = currentRunId();
  if (envelope.runId && active && envelope.runId !== active) {
    throw new CorrelationConflictError(active, envelope.runId);
  }
  const runId = envelope.runId ?? active;
  if (!runId) throw new MissingCorrelationError(kind);

  const event = MetricEventSchema.parse({
    ...fields,
    kind,
    runId,
    timestamp: envelope.timestamp ?? monotonicTimestamp(),
  });
  if (!isKind(event, kind)) {
    throw new Error(`Event kind mismatch: built "${event.kind}" for "${kind}"`);
  }
  return event;
}

/**
 * Log level an event is written at:
 * - errors, and runs that ended in error → `error`
 * - final run outcome, token totals, discoveries → `log` (visible at low)
 * - reasoning trace → `trace` (high only)
 * - everything else → `debug` (mid and up)
 */
export function metricSeverity(event: MetricEvent): LogLevel {
  switch (event.kind) {
    case "llm.error":
    case "tool.error":
      return "error";
    case "agent.end":
      return event.status === "error" ? "error" : "log";
    case "agent.token_summary":
    case "batch.discovery":
      return "log";
    case "agent.iteration":
      return "trace";
    default:
      return "debug";
  }
}

/** One self-contained JSON object, no embedded newlines. */
export function formatMetricLine(event: MetricEvent): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
}
