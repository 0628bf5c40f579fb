import {
  execFile,
  type ExecFileException,
  type ExecFileOptionsWithStringEncoding,
} from "node:child_process";
import { createLogger } from "@schema-scout/core";
import type { CapabilitySandbox } from "./capability-sandbox.js";

const logger = createLogger("command-runner");

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_BUFFER_BYTES = 1024 * 1024;

/** The slice of `child_process.execFile` the runner uses. */
export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: ExecFileOptionsWithStringEncoding,
  callback: (error: ExecFileException | null, stdout: string, stderr: string) => void,
) => void;

const nodeExecFile: ExecFileFn = (file, args, options, callback) => {
  execFile(file, args, options, callback);
};

/** Env vars safe to pass through to child processes. */
const ENV_ALLOWLIST = new Set([
  "PATH",
  "HOME",
  "LANG",
  "LC_ALL",
  "TERM",
  "USER",
  "TMPDIR",
]);

/**
 * Build a filtered copy of the environment containing only
 * safe vars, so no API keys or tokens leak to child processes.
 */
export function createSafeEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const safe: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return safe;
}

export interface CommandResult {
  command: string;
  args: string[];
  /** Process exit code, a spawn error code such as `ENOENT`, or `timeout`. */
  exitCode: number | string;
  stdout: string;
  stderr: string;
}

export function formatCommandResult(result: CommandResult): string {
  let output = `[exit: ${result.exitCode}]\n${result.stdout}`;
  if (result.stderr) {
    output += `\n[stderr]\n${result.stderr}`;
  }
  return output;
}

export interface CommandRunnerOptions {
  timeoutMs?: number;
  execFile?: ExecFileFn;
}

export interface RunOptions {
  /** Must be readable under the grant. Defaults to the grant's working directory. */
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Runs granted commands directly (never through a shell) with a filtered
 * environment and a timeout. Authorization happens on every call.
 */
export class CommandRunner {
  private readonly timeoutMs: number;
  private readonly execFile: ExecFileFn;

  constructor(
    readonly sandbox: CapabilitySandbox,
    options: CommandRunnerOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.execFile = options.execFile ?? nodeExecFile;
  }

  async run(command: string, args: readonly string[] = [], options: RunOptions = {}): Promise<CommandResult> {
    const authorized = this.sandbox.authorizeExecute(command, args);
    const cwdRequest = options.cwd ?? this.sandbox.workingDirectory;
    const cwd = cwdRequest === undefined ? undefined : this.sandbox.authorizeRead(cwdRequest);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    logger.debug(`Running ${[authorized.command, ...authorized.args].join(" ")}${cwd ? ` in ${cwd}` : ""}`);

    return new Promise<CommandResult>((resolve) => {
      const ac = new AbortController();
      const timer = setTimeout(() => ac.abort(), timeoutMs);

      this.execFile(
        authorized.command,
        authorized.args,
        {
          cwd,
          env: createSafeEnv(),
          signal: ac.signal,
          maxBuffer: MAX_BUFFER_BYTES,
          encoding: "utf-8",
        },
        (error, stdout, stderr) => {
          clearTimeout(timer);
          const base = { command: authorized.command, args: authorized.args };

          if (error && (error.killed || error.code === "ABORT_ERR" || ac.signal.aborted)) {
            resolve({ ...base, exitCode: "timeout", stdout, stderr: `Command timed out after ${timeoutMs}ms` });
            return;
          }

          resolve({ ...base, exitCode: error?.code ?? 0, stdout, stderr });
        },
      );
    });
  }
}
