import { createReadStream } from "node:fs";
import { readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createInterface, type Interface } from "node:readline";
import { createLogger } from "@schema-scout/core";
import type { CapabilitySandbox } from "./capability-sandbox.js";

const logger = createLogger("sandboxed-fs");

export interface DirectoryEntry {
  name: string;
  path: string;
  isDirectory: boolean;
  size: number;
}

export interface WriteOptions {
  /** Replace an existing file. Without it, writing over a file fails. */
  overwrite?: boolean;
}

/** Pull-based line reader over one file. */
export interface LineReader {
  readonly path: string;
  /** Up to `count` further lines; fewer (or none) at end of file. */
  next(count: number): Promise<string[]>;
  close(): void;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`);
}

/**
 * File operations that go through the capability sandbox first. Every
 * method authorizes the path on each call and works on the canonical path
 * the sandbox returns.
 */
export class SandboxedFileSystem {
  constructor(readonly sandbox: CapabilitySandbox) {}

  async readFile(path: string, options: { maxLines?: number } = {}): Promise<string> {
    const real = this.sandbox.authorizeRead(path);
    const content = await readFile(real, "utf-8");
    if (options.maxLines === undefined) return content;
    return content.split("\n").slice(0, options.maxLines).join("\n");
  }

  async writeFile(path: string, content: string, options: WriteOptions = {}): Promise<string> {
    const target = this.sandbox.authorizeWrite(path);
    try {
      await writeFile(target, content, { encoding: "utf-8", flag: options.overwrite ? "w" : "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw new Error(`File already exists: ${path}. Set overwrite to replace it.`, { cause: err });
      }
      throw err;
    }
    logger.debug(`Wrote ${content.length} characters to ${target}`);
    return target;
  }

  async listDirectory(path: string, options: { pattern?: string; filesOnly?: boolean } = {}): Promise<DirectoryEntry[]> {
    const real = this.sandbox.authorizeRead(path);
    const matcher = options.pattern ? globToRegExp(options.pattern) : undefined;
    const dirents = await readdir(real, { withFileTypes: true });
    const entries: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      if (matcher && !matcher.test(dirent.name)) continue;
      const isDirectory = dirent.isDirectory();
      if (options.filesOnly && isDirectory) continue;
      const fullPath = join(real, dirent.name);
      const size = isDirectory ? 0 : (await stat(fullPath)).size;
      entries.push({ name: dirent.name, path: fullPath, isDirectory, size });
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async lineCount(path: string): Promise<number> {
    const reader = this.openLineReader(path);
    let count = 0;
    try {
      for (;;) {
        const batch = await reader.next(1_000);
        if (batch.length === 0) return count;
        count += batch.length;
      }
    } finally {
      reader.close();
    }
  }

  openLineReader(path: string): LineReader {
    const real = this.sandbox.authorizeRead(path);
    const stream = createReadStream(real, { encoding: "utf-8" });
    const lines: Interface = createInterface({ input: stream, crlfDelay: Infinity });
    const iterator = lines[Symbol.asyncIterator]();
    let done = false;

    return {
      path: real,
      async next(count) {
        const batch: string[] = [];
        while (!done && batch.length < count) {
          const step = await iterator.next();
          if (step.done) {
            done = true;
          } else {
            batch.push(step.value);
          }
        }
        return batch;
      },
      close() {
        done = true;
        lines.close();
        stream.destroy();
      },
    };
  }
}
