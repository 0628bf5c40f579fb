import { describe, it, expect, beforeEach } from "vitest";
import { currentRunId } from "../../context/correlation.js";
import { createMemorySink, type MemorySink } from "../../metrics/sinks.js";
import { ToolLoggingPolicy } from "../../policy/tool-logging-policy.js";
import { ObservabilityDispatcher } from "../dispatcher.js";
import { runObserved } from "../run.js";

describe("runObserved", () => {
  let sink: MemorySink;
  let dispatcher: ObservabilityDispatcher;

  beforeEach(() => {
    sink = createMemorySink("mid");
    dispatcher = new ObservabilityDispatcher({
      sinks: [sink],
      policy: new ToolLoggingPolicy([["line_count", "full"]]),
    });
  });

  it("brackets the task with agent.start and agent.end", async () => {
    const run = await runObserved(
      dispatcher,
      async ({ runId }) => {
        expect(currentRunId()).toBe(runId);
        dispatcher.llmUsage({ invocationId: "c1", tokensPrompt: 10, tokensCompletion: 5 });
        return { schema: "{}" };
      },
      { runId: "run_ok", inputs: { path: "a.jsonl" } },
    );

    expect(run.runId).toBe("run_ok");
    expect(run.result).toEqual({ schema: "{}" });
    expect(run.tokens).toMatchObject({ tokensSuccessful: 15, tokensBillableEstimate: 15 });
    expect(sink.events.map((e) => e.kind)).toEqual([
      "agent.start",
      "llm.usage",
      "agent.end",
      "agent.token_summary",
    ]);
    expect(sink.events[0]).toMatchObject({ inputKeys: ["path"] });
    expect(sink.events[2]).toMatchObject({ status: "ok" });
  });

  it("mints a run id when none is given", async () => {
    const run = await runObserved(dispatcher, async () => 1);
    expect(run.runId).toMatch(/^run_/);
  });

  it("closes the run as error and rethrows the task's error", async () => {
    const boom = new Error("model unavailable");

    await expect(
      runObserved(dispatcher, async () => {
        throw boom;
      }, { runId: "run_fail" }),
    ).rejects.toBe(boom);

    const end = sink.events.find((e) => e.kind === "agent.end");
    expect(end).toMatchObject({ runId: "run_fail", status: "error" });
  });

  it("cancels in-flight work when the signal aborts", async () => {
    const controller = new AbortController();

    const run = await runObserved(
      dispatcher,
      async () => {
        dispatcher.toolStart({ invocationId: "t1", toolName: "line_count", arguments: {} });
        controller.abort();
        return "partial";
      },
      { runId: "run_abort", signal: controller.signal },
    );

    expect(run.result).toBe("partial");
    expect(sink.events.map((e) => e.kind)).toEqual([
      "agent.start",
      "tool.start",
      "tool.end",
      "agent.end",
      "agent.token_summary",
    ]);
    expect(sink.events[2]).toMatchObject({ status: "cancelled" });
    expect(sink.events[3]).toMatchObject({ status: "cancelled" });
  });

  it("ignores a tool that finishes after the run was aborted", async () => {
    const controller = new AbortController();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let late: Promise<void> = Promise.resolve();

    await runObserved(
      dispatcher,
      async () => {
        dispatcher.toolStart({ invocationId: "t1", toolName: "line_count", arguments: {} });
        late = gate.then(() => dispatcher.toolEnd({ invocationId: "t1", output: "42" }));
        controller.abort();
        return "partial";
      },
      { runId: "run_late_tool", signal: controller.signal },
    );
    release();
    await late;

    const ends = sink.events.filter((e) => e.kind === "tool.end");
    expect(ends).toHaveLength(1);
    expect(ends[0]).toMatchObject({ runId: "run_late_tool", status: "cancelled" });
  });
});
