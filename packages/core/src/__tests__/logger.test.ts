import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  clearRecentLogs,
  createLogger,
  getRecentLogs,
  isLevelEnabled,
  setConsoleLogLevel,
  verbosityToLevel,
} from "../logger.js";
import { runWithCorrelation } from "../context/correlation.js";

describe("createLogger", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setConsoleLogLevel("log");
    clearRecentLogs();
  });

  it("log() writes to console.log with colored tag", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("test");
    logger.log("hello");
    expect(spy).toHaveBeenCalledTimes(1);
    const output = spy.mock.calls[0][0] as string;
    expect(output).toContain("[test]");
    expect(output).toContain("hello");
  });

  it("warn() writes to console.warn", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("test-warn");
    logger.warn("careful");
    expect(spy).toHaveBeenCalledTimes(1);
    const output = spy.mock.calls[0][0] as string;
    expect(output).toContain("[test-warn]");
    expect(output).toContain("careful");
  });

  it("error() writes to console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("test-error");
    logger.error("oh no");
    expect(spy).toHaveBeenCalledTimes(1);
    const output = spy.mock.calls[0][0] as string;
    expect(output).toContain("[test-error]");
    expect(output).toContain("oh no");
  });

  it("same name gets same color", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const a = createLogger("same");
    const b = createLogger("same");
    a.log("x");
    b.log("y");
    const outA = spy.mock.calls[0][0] as string;
    const outB = spy.mock.calls[1][0] as string;
    const colorA = outA.split("[same]")[0];
    const colorB = outB.split("[same]")[0];
    expect(colorA).toBe(colorB);
  });

  it("hides debug and trace below the console level but still buffers them", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = createLogger("quiet");
    logger.debug("d");
    logger.trace("t");
    expect(spy).not.toHaveBeenCalled();
    expect(getRecentLogs({ name: "quiet" }).map((e) => e.level)).toEqual(["debug", "trace"]);
  });

  it("shows trace once the console level is lowered", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    setConsoleLogLevel("trace");
    createLogger("chatty").trace("step");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0] as string).toContain("step");
  });

  it("tags buffered entries with the active run", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("runs");
    logger.log("outside");
    runWithCorrelation("run_a", () => logger.log("inside"));

    const inside = getRecentLogs({ runId: "run_a" });
    expect(inside).toHaveLength(1);
    expect(inside[0].message).toBe("inside");
    expect(getRecentLogs({ name: "runs" })[0].runId).toBeUndefined();
  });
});

describe("verbosityToLevel", () => {
  it("maps low, mid and high to log, debug and trace", () => {
    expect(verbosityToLevel("low")).toBe("log");
    expect(verbosityToLevel("mid")).toBe("debug");
    expect(verbosityToLevel("high")).toBe("trace");
  });

  it("orders levels from trace to error", () => {
    expect(isLevelEnabled("error", "trace")).toBe(true);
    expect(isLevelEnabled("debug", "log")).toBe(false);
    expect(isLevelEnabled("log", "log")).toBe(true);
  });
});
