import { randomUUID } from "node:crypto";
import { createLogger, type LifecycleEmitter, type MetricStatus } from "@schema-scout/core";
import type { LineReader, SandboxedFileSystem } from "../sandbox/sandboxed-fs.js";

const logger = createLogger("handles");

export const DEFAULT_BATCH_LINES = 50;

export interface HandleEntry {
  readonly id: string;
  readonly path: string;
  linesRead: number;
  batches: number;
  readonly reader: LineReader;
}

export interface HandleRegistryOptions {
  /** Receives handle and batch lifecycle notifications. */
  emitter?: LifecycleEmitter;
  /** Only files with these extensions may be opened. */
  extensions?: string[];
}

export class UnknownHandleError extends Error {
  constructor(id: string) {
    super(`Invalid or expired handle: ${id}`);
    this.name = "UnknownHandleError";
  }
}

/**
 * Open line readers over large JSON-lines files, read in batches. Each
 * read is one batch; opening and closing a handle bracket its lifetime.
 */
export class HandleRegistry {
  private readonly handles = new Map<string, HandleEntry>();
  private readonly emitter?: LifecycleEmitter;
  private readonly extensions: string[];

  constructor(
    private readonly fs: SandboxedFileSystem,
    options: HandleRegistryOptions = {},
  ) {
    this.emitter = options.emitter;
    this.extensions = options.extensions ?? [".jsonl"];
  }

  get size(): number {
    return this.handles.size;
  }

  get(id: string): HandleEntry {
    const entry = this.handles.get(id);
    if (!entry) throw new UnknownHandleError(id);
    return entry;
  }

  async open(path: string): Promise<string> {
    if (!this.extensions.some((ext) => path.toLowerCase().endsWith(ext))) {
      throw new Error(`Only ${this.extensions.join(", ")} files can be opened: ${path}`);
    }
    const totalLines = await this.fs.lineCount(path);
    const reader = this.fs.openLineReader(path);
    const id = randomUUID().replace(/-/g, "");
    this.handles.set(id, { id, path: reader.path, linesRead: 0, batches: 0, reader });
    this.emitter?.emit("notification", {
      invocationId: id,
      kind: "handle",
      phase: "start",
      payload: { path: reader.path, totalLines },
    });
    logger.debug(`Opened handle ${id} on ${reader.path} (${totalLines} lines)`);
    return id;
  }

  /** Next batch of up to `count` lines. An empty array means end of file. */
  async read(id: string, count: number = DEFAULT_BATCH_LINES): Promise<string[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error("Number of lines must be a positive integer");
    }
    const entry = this.get(id);
    entry.batches++;
    const invocationId = `${id}:${entry.batches}`;
    this.emitter?.emit("notification", {
      invocationId,
      kind: "batch",
      phase: "start",
      payload: { batchNumber: entry.batches, plannedLines: count },
    });

    let lines: string[];
    try {
      lines = await entry.reader.next(count);
    } catch (err) {
      this.emitBatchEnd(invocationId, 0, entry.linesRead, "error");
      throw err;
    }
    entry.linesRead += lines.length;
    this.emitBatchEnd(invocationId, lines.length, entry.linesRead, "ok");
    return lines;
  }

  close(id: string, status: MetricStatus = "ok"): HandleEntry {
    const entry = this.get(id);
    entry.reader.close();
    this.handles.delete(id);
    this.emitter?.emit("notification", {
      invocationId: id,
      kind: "handle",
      phase: "end",
      payload: { linesRead: entry.linesRead, status },
    });
    logger.debug(`Closed handle ${id} after ${entry.linesRead} lines`);
    return entry;
  }

  /** Close every open handle, e.g. when a run ends with handles left open. */
  closeAll(status: MetricStatus = "cancelled"): number {
    const ids = [...this.handles.keys()];
    for (const id of ids) this.close(id, status);
    return ids.length;
  }

  private emitBatchEnd(invocationId: string, linesRead: number, cumulativeLines: number, status: MetricStatus): void {
    this.emitter?.emit("notification", {
      invocationId,
      kind: "batch",
      phase: "end",
      payload: { linesRead, cumulativeLines, status },
    });
  }
}
