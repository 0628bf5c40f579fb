import { createLogger } from "./logger.js";
import { errorKind, errorMessage } from "./errors.js";

const logger = createLogger("observability");

const MAX_REMEMBERED_FAILURES = 1_000;
const reported = new Set<string>();
let failureCount = 0;

/**
 * Record an observability failure. Each distinct (where, kind, message)
 * is logged once at debug; every occurrence is counted.
 */
export function reportObservabilityFailure(where: string, err: unknown): void {
  failureCount++;
  const key = `${where}|${errorKind(err)}|${errorMessage(err)}`;
  if (reported.has(key)) return;
  if (reported.size >= MAX_REMEMBERED_FAILURES) reported.clear();
  reported.add(key);
  try {
    logger.debug(`${where} failed (${errorKind(err)}): ${errorMessage(err)}`);
  } catch {
    // The logger itself is an observability channel; nothing left to tell.
  }
}

/**
 * Run an observability side effect. Anything it throws is reported and
 * dropped; the return value is `undefined` on failure.
 */
export function bestEffort<T>(where: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (err) {
    reportObservabilityFailure(where, err);
    return undefined;
  }
}

export async function bestEffortAsync<T>(where: string, fn: () => Promise<T>): Promise<T | undefined> {
  try {
    return await fn();
  } catch (err) {
    reportObservabilityFailure(where, err);
    return undefined;
  }
}

export function getObservabilityFailureCount(): number {
  return failureCount;
}

/** Forget reported failures. Intended for tests. */
export function resetObservabilityFailures(): void {
  failureCount = 0;
  reported.clear();
}
