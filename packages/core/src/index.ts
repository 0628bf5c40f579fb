// Schemas
export {
  AppConfigSchema,
  CapabilityGrantSchema,
  VerbositySchema,
} from "./schemas/config.schema.js";
export { ToolPermissionSchema, LoggingStrategySchema } from "./schemas/tool.schema.js";
export { MetricEventSchema, MetricStatusSchema } from "./schemas/metric.schema.js";

// Types
export type {
  AppConfig,
  CapabilityGrantInput,
  LoggingConfig,
  SandboxConfig,
  ToolsConfig,
  LlmConfig,
  Verbosity,
} from "./schemas/config.schema.js";
export type {
  ToolDefinition,
  ToolPermission,
  LoggingStrategy,
} from "./schemas/tool.schema.js";
export type {
  MetricEvent,
  MetricEventOf,
  MetricFields,
  MetricKind,
  MetricStatus,
} from "./schemas/metric.schema.js";

// Config
export { loadConfig } from "./config/loader.js";
export type { LoadConfigOptions } from "./config/loader.js";

// Errors
export {
  MissingCorrelationError,
  CorrelationConflictError,
  ConfigError,
  errorKind,
  errorMessage,
} from "./errors.js";
export {
  bestEffort,
  bestEffortAsync,
  reportObservabilityFailure,
  getObservabilityFailureCount,
  resetObservabilityFailures,
} from "./best-effort.js";

// Correlation
export {
  RUN_ID_PREFIX,
  generateRunId,
  createCorrelationContext,
  runWithCorrelation,
  activateCorrelation,
  deactivateCorrelation,
  currentCorrelation,
  currentRunId,
} from "./context/correlation.js";
export type { CorrelationContext } from "./context/correlation.js";

// Metrics
export { createMetricEvent, metricSeverity, formatMetricLine, monotonicTimestamp } from "./metrics/events.js";
export type { MetricEnvelope } from "./metrics/events.js";
export { emitMetric, isVisibleAt, createConsoleSink, createMemorySink } from "./metrics/sinks.js";
export type { MetricSink, MemorySink } from "./metrics/sinks.js";
export { createFileSink } from "./metrics/file-sink.js";
export type { FileSink, FileSinkOptions } from "./metrics/file-sink.js";

// Ledger
export { TokenLedger } from "./ledger/token-ledger.js";
export type { TokenUsage, LedgerEntry, ModelPricing, TokenSummary } from "./ledger/token-ledger.js";

// Policy
export {
  ToolLoggingPolicy,
  UnknownToolPolicyError,
  TOOL_DETAIL_RANK,
  DEFAULT_STRATEGY,
  DEFAULT_TRUNCATE_LIMIT,
  TRUNCATION_MARKER,
  byteSize,
} from "./policy/tool-logging-policy.js";
export type { ToolDetail, ToolLoggingPolicyOptions } from "./policy/tool-logging-policy.js";

// Observability
export { ObservabilityDispatcher, describeData } from "./observability/dispatcher.js";
export type {
  DispatcherOptions,
  LlmStartInput,
  LlmUsageInput,
  LlmEndInput,
  LlmErrorInput,
  ToolStartInput,
  ToolEndInput,
  ToolErrorInput,
  AgentStartInput,
  AgentEndInput,
  AgentErrorInput,
  AgentActionInput,
  AgentFinishInput,
  BatchStartInput,
  BatchEndInput,
  BatchDiscoveryInput,
  HandleOpenInput,
  HandleCloseInput,
} from "./observability/dispatcher.js";
export {
  LifecycleEmitter,
  LifecycleNotificationSchema,
  LifecyclePayloadSchemas,
  isLifecycleRoute,
} from "./observability/lifecycle-events.js";
export type {
  LifecycleEventMap,
  LifecycleKind,
  LifecyclePhase,
  LifecycleNotification,
  LifecycleRoute,
} from "./observability/lifecycle-events.js";
export { runObserved } from "./observability/run.js";
export type { ObservedRun, ObservedRunOptions, ObservedRunScope } from "./observability/run.js";

// Model
export { createObservedModel } from "./model/observed-model.js";
export type { ObservedModelOptions } from "./model/observed-model.js";
export type { LanguageModelV1 } from "ai";

// Logger
export {
  createLogger,
  getRecentLogs,
  clearRecentLogs,
  setConsoleLogLevel,
  getConsoleLogLevel,
  verbosityToLevel,
  isLevelEnabled,
  LOG_LEVEL_RANK,
} from "./logger.js";
export type { Logger, LogEntry, LogLevel } from "./logger.js";
