import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { CorrelationConflictError } from "../errors.js";

export const RUN_ID_PREFIX = "run_";

export interface CorrelationContext {
  readonly runId: string;
  readonly createdAt: string;
}

const storage = new AsyncLocalStorage<CorrelationContext | undefined>();

/** `run_` followed by 32 lowercase hex characters (128 random bits). */
export function generateRunId(): string {
  return `${RUN_ID_PREFIX}${randomBytes(16).toString("hex")}`;
}

export function createCorrelationContext(runId: string = generateRunId()): CorrelationContext {
  if (runId.trim() === "") {
    throw new Error("Correlation run id must be a non-empty string");
  }
  return Object.freeze({ runId, createdAt: new Date().toISOString() });
}

function toContext(runIdOrContext: string | CorrelationContext): CorrelationContext {
  return typeof runIdOrContext === "string"
    ? createCorrelationContext(runIdOrContext)
    : Object.freeze({ ...runIdOrContext });
}

/** The context already bound to this scope, after checking it is the same run. */
function boundContext(runIdOrContext: string | CorrelationContext): CorrelationContext | undefined {
  const existing = storage.getStore();
  if (!existing) return undefined;
  const runId = typeof runIdOrContext === "string" ? runIdOrContext : runIdOrContext.runId;
  if (existing.runId !== runId) throw new CorrelationConflictError(existing.runId, runId);
  return existing;
}

/**
 * Run `fn` with the given run bound to its async scope. Everything scheduled
 * from inside `fn` (awaits, timers, promises started concurrently) sees the
 * same run; sibling scopes keep their own.
 */
export function runWithCorrelation<T>(runIdOrContext: string | CorrelationContext, fn: () => T): T {
  if (boundContext(runIdOrContext)) return fn();
  return storage.run(toContext(runIdOrContext), fn);
}

/**
 * Bind a run to the current async scope without a callback. Prefer
 * `runWithCorrelation` where the scope has a natural function boundary.
 */
export function activateCorrelation(runIdOrContext: string | CorrelationContext): CorrelationContext {
  const existing = boundContext(runIdOrContext);
  if (existing) return existing;
  const context = toContext(runIdOrContext);
  storage.enterWith(context);
  return context;
}

export function deactivateCorrelation(): void {
  storage.enterWith(undefined);
}

export function currentCorrelation(): CorrelationContext | undefined {
  return storage.getStore();
}

/** The active run id, or `undefined` outside any bound scope. Never a placeholder. */
export function currentRunId(): string | undefined {
  return storage.getStore()?.runId;
}
