import { currentRunId } from "./context/correlation.js";
import type { Verbosity } from "./schemas/config.schema.js";

const COLORS = [
  "\x1b[36m",  // cyan
  "\x1b[35m",  // magenta
  "\x1b[33m",  // yellow
  "\x1b[32m",  // green
  "\x1b[34m",  // blue
  "\x1b[96m",  // bright cyan
  "\x1b[95m",  // bright magenta
  "\x1b[93m",  // bright yellow
  "\x1b[92m",  // bright green
  "\x1b[94m",  // bright blue
] as const;

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const colorMap = new Map<string, string>();

function pickColor(name: string): string {
  const existing = colorMap.get(name);
  if (existing) return existing;
  const color = COLORS[colorMap.size % COLORS.length];
  colorMap.set(name, color);
  return color;
}

export type LogLevel = "trace" | "debug" | "log" | "warn" | "error";

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  log: 2,
  warn: 3,
  error: 4,
};

const VERBOSITY_LEVEL: Record<Verbosity, LogLevel> = {
  low: "log",
  mid: "debug",
  high: "trace",
};

/** Lowest log level a destination at this verbosity shows. */
export function verbosityToLevel(verbosity: Verbosity): LogLevel {
  return VERBOSITY_LEVEL[verbosity];
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[threshold];
}

export interface Logger {
  trace: (message: string) => void;
  debug: (message: string) => void;
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

// --------------- In-memory log ring buffer ---------------

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  name: string;
  message: string;
  runId?: string;
}

const LOG_BUFFER: LogEntry[] = [];
const MAX_LOG_ENTRIES = 500;

function pushLog(level: LogLevel, name: string, message: string): void {
  if (LOG_BUFFER.length >= MAX_LOG_ENTRIES) LOG_BUFFER.shift();
  const runId = currentRunId();
  LOG_BUFFER.push({
    timestamp: new Date().toISOString(),
    level,
    name,
    message,
    ...(runId ? { runId } : {}),
  });
}

export function getRecentLogs(filter?: {
  name?: string;
  level?: LogLevel;
  runId?: string;
  limit?: number;
}): LogEntry[] {
  let entries: LogEntry[] = LOG_BUFFER;
  if (filter?.name) {
    const n = filter.name;
    entries = entries.filter((e) => e.name === n);
  }
  if (filter?.level) {
    const l = filter.level;
    entries = entries.filter((e) => e.level === l);
  }
  if (filter?.runId) {
    const r = filter.runId;
    entries = entries.filter((e) => e.runId === r);
  }
  const limit = filter?.limit ?? 50;
  return entries.slice(-limit);
}

export function clearRecentLogs(): void {
  LOG_BUFFER.length = 0;
}

// ---------------------------------------------------------

let consoleThreshold: LogLevel = "log";

export function setConsoleLogLevel(level: LogLevel): void {
  consoleThreshold = level;
}

export function getConsoleLogLevel(): LogLevel {
  return consoleThreshold;
}

export function createLogger(name: string): Logger {
  const color = pickColor(name);
  const tag = `${color}[${name}]${RESET}`;

  const write = (level: LogLevel, message: string): void => {
    pushLog(level, name, message);
    if (!isLevelEnabled(level, consoleThreshold)) return;
    switch (level) {
      case "trace":
      case "debug":
        console.debug(`${tag} ${DIM}${message}${RESET}`);
        break;
      case "log":
        console.log(`${tag} ${message}`);
        break;
      case "warn":
        console.warn(`${tag} ${YELLOW}${message}${RESET}`);
        break;
      case "error":
        console.error(`${tag} ${RED}${message}${RESET}`);
        break;
    }
  };

  return {
    trace: (message: string) => write("trace", message),
    debug: (message: string) => write("debug", message),
    log: (message: string) => write("log", message),
    warn: (message: string) => write("warn", message),
    error: (message: string) => write("error", message),
  };
}
