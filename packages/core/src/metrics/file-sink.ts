import { mkdirSync, statSync } from "node:fs";
import { appendFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { reportObservabilityFailure } from "../best-effort.js";
import type { Verbosity } from "../schemas/config.schema.js";
import type { MetricSink } from "./sinks.js";

export interface FileSinkOptions {
  path: string;
  verbosity: Verbosity;
  /** Rotate once the active file would grow past this size. */
  maxBytes?: number;
  /** Rotated files kept as `<path>.1` … `<path>.N`. 0 disables rotation. */
  maxFiles?: number;
}

export interface FileSink extends MetricSink {
  /** Resolves once every line written so far is on disk. */
  flush(): Promise<void>;
  close(): Promise<void>;
}

function currentSize(path: string): number {
  try {
    return statSync(path).size;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
}

/**
 * JSON-lines file sink. `write` only queues; the disk write happens on a
 * later tick so a timed operation never waits on the file system.
 */
export function createFileSink(options: FileSinkOptions): FileSink {
  const { path, verbosity } = options;
  const maxBytes = options.maxBytes ?? 10 * 1024 * 1024;
  const maxFiles = options.maxFiles ?? 5;

  mkdirSync(dirname(path), { recursive: true });
  let size = currentSize(path);
  let pending: string[] = [];
  let scheduled = false;
  let closed = false;
  let chain: Promise<void> = Promise.resolve();

  async function rotate(): Promise<void> {
    if (maxFiles === 0) {
      await rm(path, { force: true });
      size = 0;
      return;
    }
    for (let i = maxFiles - 1; i >= 1; i--) {
      await rename(`${path}.${i}`, `${path}.${i + 1}`).catch((err: NodeJS.ErrnoException) => {
        if (err.code !== "ENOENT") throw err;
      });
    }
    await rename(path, `${path}.1`).catch((err: NodeJS.ErrnoException) => {
      if (err.code !== "ENOENT") throw err;
    });
    size = 0;
  }

  async function drain(): Promise<void> {
    const batch = pending;
    pending = [];
    scheduled = false;
    if (batch.length === 0) return;
    const chunk = batch.join("");
    const bytes = Buffer.byteLength(chunk, "utf-8");
    if (size > 0 && size + bytes > maxBytes) await rotate();
    await appendFile(path, chunk, "utf-8");
    size += bytes;
  }

  function schedule(): void {
    if (scheduled) return;
    scheduled = true;
    setImmediate(() => {
      chain = chain.then(drain).catch((err: unknown) => reportObservabilityFailure(`file sink ${path}`, err));
    });
  }

  async function flush(): Promise<void> {
    chain = chain.then(drain).catch((err: unknown) => reportObservabilityFailure(`file sink ${path}`, err));
    await chain;
  }

  return {
    name: `file:${path}`,
    verbosity,
    write: (line) => {
      if (closed) throw new Error(`File sink ${path} is closed`);
      pending.push(`${line}\n`);
      schedule();
    },
    flush,
    close: async () => {
      closed = true;
      await flush();
    },
  };
}
