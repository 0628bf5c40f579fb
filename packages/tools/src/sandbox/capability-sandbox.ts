import { lstatSync, realpathSync } from "node:fs";
import { basename, dirname, isAbsolute, join, resolve, sep } from "node:path";
import { CapabilityGrantSchema, createLogger, type CapabilityGrantInput } from "@schema-scout/core";
import { SandboxViolation, type SandboxBoundary } from "../errors.js";

const logger = createLogger("sandbox");

export type SandboxDecision = "allow" | "deny";

export interface CapabilityGrant {
  readonly readableRoots: readonly string[];
  readonly writableRoots: readonly string[];
  readonly executableCommands: readonly string[];
  /** Base for relative paths. */
  readonly workingDirectory?: string;
}

export interface AuthorizedCommand {
  command: string;
  args: string[];
}

type Verdict<T> = { ok: true; value: T } | { ok: false; reason: string };

/** Bare executable names only: no separators, no shell metacharacters. */
const BARE_COMMAND = /^[A-Za-z0-9._+-]+$/;

/** An argument (or `--opt=` value) the command could resolve as a path. */
function isPathLike(value: string): boolean {
  return value.includes("/") || value === "." || value === "..";
}

/**
 * Validate a grant and fix it for the life of the process. Roots are made
 * absolute; the working directory defaults to the first readable root.
 */
export function createCapabilityGrant(input: CapabilityGrantInput = {}): CapabilityGrant {
  const parsed = CapabilityGrantSchema.parse(input);
  const readableRoots = parsed.readableRoots.map((root) => resolve(root));
  const workingDirectory = parsed.workingDirectory
    ? resolve(parsed.workingDirectory)
    : readableRoots[0];
  return Object.freeze({
    readableRoots: Object.freeze(readableRoots),
    writableRoots: Object.freeze(parsed.writableRoots.map((root) => resolve(root))),
    executableCommands: Object.freeze([...parsed.executableCommands]),
    ...(workingDirectory ? { workingDirectory } : {}),
  });
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function isUnder(path: string, root: string): boolean {
  if (path === root) return true;
  const prefix = root.endsWith(sep) ? root : root + sep;
  return path.startsWith(prefix);
}

/** Canonical roots, recomputed per request. Roots that do not exist grant nothing. */
function canonicalRoots(roots: readonly string[]): string[] {
  const result: string[] = [];
  for (const root of roots) {
    try {
      result.push(realpathSync(root));
    } catch {
      logger.debug(`Grant root ${root} does not resolve; ignoring it`);
    }
  }
  return result;
}

/**
 * Decides whether a read, a write or a command execution stays inside the
 * capability grant. Paths are judged by where they really point after
 * `..` segments and symlinks are resolved. Nothing is cached between
 * requests, and a check never performs the operation itself.
 */
export class CapabilitySandbox {
  readonly grant: CapabilityGrant;

  constructor(grant: CapabilityGrant) {
    this.grant = grant;
  }

  get workingDirectory(): string | undefined {
    return this.grant.workingDirectory;
  }

  checkRead(path: string): SandboxDecision {
    return this.evaluateRead(path).ok ? "allow" : "deny";
  }

  checkWrite(path: string): SandboxDecision {
    return this.evaluateWrite(path).ok ? "allow" : "deny";
  }

  checkExecute(command: string, args: readonly string[] = []): SandboxDecision {
    return this.evaluateExecute(command, args).ok ? "allow" : "deny";
  }

  /** Canonical path of a readable file or directory, or throws `SandboxViolation`. */
  authorizeRead(path: string): string {
    return this.unwrap("read", path, this.evaluateRead(path));
  }

  /** Canonical path a write may target, or throws `SandboxViolation`. */
  authorizeWrite(path: string): string {
    return this.unwrap("write", path, this.evaluateWrite(path));
  }

  authorizeExecute(command: string, args: readonly string[] = []): AuthorizedCommand {
    return this.unwrap("execute", command, this.evaluateExecute(command, args));
  }

  // ─── Evaluation ───────────────────────────────────────────────────

  private absolute(path: string): Verdict<string> {
    if (path.includes("\0")) return { ok: false, reason: "path contains a NUL byte" };
    if (isAbsolute(path)) return { ok: true, value: resolve(path) };
    const base = this.grant.workingDirectory;
    if (!base) return { ok: false, reason: "relative path with no working directory" };
    return { ok: true, value: resolve(base, path) };
  }

  private evaluateRead(path: string): Verdict<string> {
    const abs = this.absolute(path);
    if (!abs.ok) return abs;

    let real: string;
    try {
      real = realpathSync(abs.value);
    } catch (err) {
      return { ok: false, reason: errnoCode(err) === "ENOENT" ? "does not exist" : `cannot resolve (${errnoCode(err) ?? "unknown"})` };
    }

    const roots = canonicalRoots(this.grant.readableRoots);
    if (!roots.some((root) => isUnder(real, root))) {
      return { ok: false, reason: "outside the readable roots" };
    }
    return { ok: true, value: real };
  }

  private evaluateWrite(path: string): Verdict<string> {
    const abs = this.absolute(path);
    if (!abs.ok) return abs;

    let target: string;
    let exists = true;
    try {
      lstatSync(abs.value);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        return { ok: false, reason: `cannot inspect (${errnoCode(err) ?? "unknown"})` };
      }
      exists = false;
    }

    if (exists) {
      try {
        target = realpathSync(abs.value);
      } catch {
        return { ok: false, reason: "symlink target does not exist" };
      }
    } else {
      let parent: string;
      try {
        parent = realpathSync(dirname(abs.value));
      } catch {
        return { ok: false, reason: "parent directory does not exist" };
      }
      target = join(parent, basename(abs.value));
    }

    const roots = canonicalRoots(this.grant.writableRoots);
    if (!roots.some((root) => isUnder(target, root))) {
      return { ok: false, reason: "outside the writable roots" };
    }
    return { ok: true, value: target };
  }

  private evaluateExecute(command: string, args: readonly string[]): Verdict<AuthorizedCommand> {
    if (!BARE_COMMAND.test(command) || command === "." || command === "..") {
      return { ok: false, reason: "not a bare command name" };
    }
    if (!this.grant.executableCommands.includes(command)) {
      return { ok: false, reason: "not in the executable commands" };
    }
    for (const arg of args) {
      if (arg.includes("\0")) return { ok: false, reason: "argument contains a NUL byte" };
      const value = arg.startsWith("-") && arg.includes("=") ? arg.slice(arg.indexOf("=") + 1) : arg;
      if (isPathLike(value) && !this.evaluateRead(value).ok) {
        return { ok: false, reason: `path argument "${arg}" is not readable` };
      }
    }
    return { ok: true, value: { command, args: [...args] } };
  }

  private unwrap<T>(boundary: SandboxBoundary, target: string, verdict: Verdict<T>): T {
    if (verdict.ok) return verdict.value;
    throw new SandboxViolation(boundary, target, verdict.reason);
  }
}
