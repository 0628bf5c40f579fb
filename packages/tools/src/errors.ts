export type SandboxBoundary = "read" | "write" | "execute";

/** A request outside the capability grant. Always surfaces to the caller. */
export class SandboxViolation extends Error {
  readonly boundary: SandboxBoundary;
  readonly target: string;
  readonly reason: string;

  constructor(boundary: SandboxBoundary, target: string, reason: string) {
    super(`Sandbox denied ${boundary} of "${target}": ${reason}`);
    this.name = "SandboxViolation";
    this.boundary = boundary;
    this.target = target;
    this.reason = reason;
  }
}

export class ToolRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolRegistrationError";
  }
}
