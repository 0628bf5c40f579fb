import { createLogger, isLevelEnabled, verbosityToLevel, type LogLevel, type Logger } from "../logger.js";
import { bestEffort } from "../best-effort.js";
import type { Verbosity } from "../schemas/config.schema.js";
import { MetricEventSchema, type MetricEvent } from "../schemas/metric.schema.js";
import { formatMetricLine, metricSeverity } from "./events.js";

/**
 * A destination for metric lines. Each sink has its own verbosity; the
 * dispatcher shapes tool detail per sink and `emitMetric` filters by it.
 */
export interface MetricSink {
  readonly name: string;
  readonly verbosity: Verbosity;
  write(line: string, severity: LogLevel): void;
  /** Drain anything buffered. */
  close?(): Promise<void>;
}

export function isVisibleAt(event: MetricEvent, verbosity: Verbosity): boolean {
  return isLevelEnabled(metricSeverity(event), verbosityToLevel(verbosity));
}

/**
 * Write one event to one sink. Never throws: serialization and sink
 * failures are reported as observability failures and dropped.
 * Returns whether the line was handed to the sink.
 */
export function emitMetric(event: MetricEvent, sink: MetricSink): boolean {
  const written = bestEffort(`emit ${event.kind} to ${sink.name}`, () => {
    if (!isVisibleAt(event, sink.verbosity)) return false;
    sink.write(formatMetricLine(event), metricSeverity(event));
    return true;
  });
  return written ?? false;
}

export function createConsoleSink(verbosity: Verbosity, logger: Logger = createLogger("metrics")): MetricSink {
  return {
    name: "console",
    verbosity,
    write: (line, severity) => logger[severity](line),
  };
}

export interface MemorySink extends MetricSink {
  readonly events: MetricEvent[];
  clear(): void;
}

/** Keeps parsed events in memory, for in-process consumers and tests. */
export function createMemorySink(verbosity: Verbosity, name = "memory"): MemorySink {
  const events: MetricEvent[] = [];
  return {
    name,
    verbosity,
    events,
    write: (line) => {
      events.push(MetricEventSchema.parse(JSON.parse(line)));
    },
    clear: () => {
      events.length = 0;
    },
  };
}
