import { z } from "zod";

export const MetricStatusSchema = z.enum(["ok", "error", "cancelled"]);

const count = z.number().int().nonnegative();
const duration = z.number().nonnegative();
const sizes = z.record(z.string(), count);

const base = {
  runId: z.string().min(1),
  timestamp: z.string().datetime(),
};

export const LlmStartEventSchema = z.object({
  ...base,
  kind: z.literal("llm.start"),
  model: z.string().min(1),
  modelVersion: z.string().optional(),
  promptSizeBytes: count,
}).strict();

export const LlmUsageEventSchema = z.object({
  ...base,
  kind: z.literal("llm.usage"),
  tokensPrompt: count,
  tokensCompletion: count,
  tokensTotal: count,
}).strict();

export const LlmEndEventSchema = z.object({
  ...base,
  kind: z.literal("llm.end"),
  status: MetricStatusSchema,
  durationMs: duration,
}).strict();

export const LlmErrorEventSchema = z.object({
  ...base,
  kind: z.literal("llm.error"),
  errorKind: z.string().min(1),
  message: z.string(),
}).strict();

export const ToolStartEventSchema = z.object({
  ...base,
  kind: z.literal("tool.start"),
  toolName: z.string().min(1),
  invocationId: z.string().min(1),
  inputSizeBytes: count,
  arguments: z.unknown().optional(),
}).strict();

export const ToolEndEventSchema = z.object({
  ...base,
  kind: z.literal("tool.end"),
  toolName: z.string().min(1),
  invocationId: z.string().min(1),
  status: MetricStatusSchema,
  durationMs: duration,
  outputSizeBytes: count,
  resultSummary: z.string(),
}).strict();

export const ToolErrorEventSchema = z.object({
  ...base,
  kind: z.literal("tool.error"),
  toolName: z.string().min(1),
  invocationId: z.string().min(1),
  errorKind: z.string().min(1),
  message: z.string(),
}).strict();

export const AgentStartEventSchema = z.object({
  ...base,
  kind: z.literal("agent.start"),
  inputKeys: z.array(z.string()),
  inputSizes: sizes,
}).strict();

export const AgentEndEventSchema = z.object({
  ...base,
  kind: z.literal("agent.end"),
  status: MetricStatusSchema,
  durationMs: duration,
  outputKeys: z.array(z.string()),
  outputSizes: sizes,
}).strict();

export const AgentTokenSummaryEventSchema = z.object({
  ...base,
  kind: z.literal("agent.token_summary"),
  tokensBillableEstimate: count,
  tokensSuccessful: count,
  estimatedCostUsd: z.number().nonnegative().optional(),
}).strict();

export const BatchStartEventSchema = z.object({
  ...base,
  kind: z.literal("batch.start"),
  batchNumber: z.number().int().positive(),
  plannedLines: count,
}).strict();

export const BatchEndEventSchema = z.object({
  ...base,
  kind: z.literal("batch.end"),
  batchNumber: z.number().int().positive(),
  status: MetricStatusSchema,
  linesRead: count,
  cumulativeLines: count,
  durationMs: duration,
}).strict();

export const BatchDiscoveryEventSchema = z.object({
  ...base,
  kind: z.literal("batch.discovery"),
  batchNumber: z.number().int().positive(),
  newLogTypes: count,
  newFields: count,
}).strict();

export const HandleOpenEventSchema = z.object({
  ...base,
  kind: z.literal("handle.open"),
  handleId: z.string().min(1),
  path: z.string().min(1),
  totalLines: count.optional(),
}).strict();

export const HandleCloseEventSchema = z.object({
  ...base,
  kind: z.literal("handle.close"),
  handleId: z.string().min(1),
  status: MetricStatusSchema,
  linesRead: count,
  durationMs: duration,
}).strict();

export const AgentIterationEventSchema = z.object({
  ...base,
  kind: z.literal("agent.iteration"),
  iterationNumber: z.number().int().positive(),
  actionKind: z.enum(["tool_call", "finish"]),
  actionSummary: z.string(),
  observationSummary: z.string(),
}).strict();

export const MetricEventSchema = z.discriminatedUnion("kind", [
  LlmStartEventSchema,
  LlmUsageEventSchema,
  LlmEndEventSchema,
  LlmErrorEventSchema,
  ToolStartEventSchema,
  ToolEndEventSchema,
  ToolErrorEventSchema,
  AgentStartEventSchema,
  AgentEndEventSchema,
  AgentTokenSummaryEventSchema,
  BatchStartEventSchema,
  BatchEndEventSchema,
  BatchDiscoveryEventSchema,
  HandleOpenEventSchema,
  HandleCloseEventSchema,
  AgentIterationEventSchema,
]);

export type MetricStatus = z.infer<typeof MetricStatusSchema>;
export type MetricEvent = z.infer<typeof MetricEventSchema>;
export type MetricKind = MetricEvent["kind"];
export type MetricEventOf<K extends MetricKind> = Extract<MetricEvent, { kind: K }>;
/** The variant-specific fields of an event, without the envelope. */
export type MetricFields<K extends MetricKind> = Omit<MetricEventOf<K>, "kind" | "runId" | "timestamp">;
