import { EventEmitter } from "node:events";
import { z } from "zod";

export const LifecycleKindSchema = z.enum(["llm", "tool", "agent", "batch", "handle"]);
export const LifecyclePhaseSchema = z.enum(["start", "usage", "end", "error", "action", "finish", "discovery"]);

/**
 * What the orchestration layer reports about one invocation. The payload
 * carries the fields of the matching handler input (see `dispatcher.ts`).
 */
export const LifecycleNotificationSchema = z.object({
  invocationId: z.string().min(1),
  kind: LifecycleKindSchema,
  phase: LifecyclePhaseSchema,
  payload: z.record(z.unknown()).default({}),
});

export type LifecycleKind = z.infer<typeof LifecycleKindSchema>;
export type LifecyclePhase = z.infer<typeof LifecyclePhaseSchema>;
export type LifecycleNotification = z.input<typeof LifecycleNotificationSchema>;

export interface LifecycleEventMap {
  notification: [notification: LifecycleNotification];
}

export class LifecycleEmitter extends EventEmitter<LifecycleEventMap> {}

// ─── Payload schemas, one per routed kind/phase ─────────────────────

const count = z.number().int().nonnegative();
const status = z.enum(["ok", "error", "cancelled"]);

export const LifecyclePayloadSchemas = {
  "llm.start": z.object({
    model: z.string().min(1),
    modelVersion: z.string().optional(),
    prompt: z.unknown(),
  }),
  "llm.usage": z.object({
    tokensPrompt: count,
    tokensCompletion: count,
    succeeded: z.boolean().default(true),
  }),
  "llm.end": z.object({ status: status.default("ok") }),
  "llm.error": z.object({
    error: z.unknown(),
    usage: z.object({ tokensPrompt: count, tokensCompletion: count }).optional(),
  }),
  "tool.start": z.object({ toolName: z.string().min(1), arguments: z.unknown() }),
  "tool.end": z.object({
    toolName: z.string().min(1).optional(),
    output: z.string().default(""),
    status: status.default("ok"),
  }),
  "tool.error": z.object({ toolName: z.string().min(1).optional(), error: z.unknown() }),
  "agent.start": z.object({ inputs: z.unknown() }),
  "agent.end": z.object({ outputs: z.unknown(), status: status.default("ok") }),
  "agent.error": z.object({ error: z.unknown() }),
  "agent.action": z.object({ toolName: z.string().min(1), toolInput: z.unknown() }),
  "agent.finish": z.object({ output: z.unknown() }),
  "batch.start": z.object({ batchNumber: z.number().int().positive(), plannedLines: count }),
  "batch.end": z.object({ linesRead: count, cumulativeLines: count, status: status.default("ok") }),
  "batch.discovery": z.object({
    batchNumber: z.number().int().positive(),
    newLogTypes: count,
    newFields: count,
  }),
  "handle.start": z.object({ path: z.string().min(1), totalLines: count.optional() }),
  "handle.end": z.object({ linesRead: count, status: status.default("ok") }),
} as const;

export type LifecycleRoute = keyof typeof LifecyclePayloadSchemas;

export function isLifecycleRoute(key: string): key is LifecycleRoute {
  return Object.prototype.hasOwnProperty.call(LifecyclePayloadSchemas, key);
}
