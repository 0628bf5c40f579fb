export class MissingCorrelationError extends Error {
  constructor(kind: string) {
    super(`Cannot build "${kind}" event: no run is active in this scope`);
    this.name = "MissingCorrelationError";
  }
}

export class CorrelationConflictError extends Error {
  readonly activeRunId: string;
  readonly requestedRunId: string;

  constructor(activeRunId: string, requestedRunId: string) {
    super(`Scope is already bound to ${activeRunId}; refusing to rebind it to ${requestedRunId}`);
    this.name = "CorrelationConflictError";
    this.activeRunId = activeRunId;
    this.requestedRunId = requestedRunId;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Short, stable label for an error's type, used as `errorKind` in events. */
export function errorKind(err: unknown): string {
  if (err instanceof Error) return err.name || err.constructor.name || "Error";
  return typeof err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
