import { describe, it, expect, vi, beforeEach } from "vitest";
import type { LanguageModelV1, LanguageModelV1StreamPart } from "ai";
import { runWithCorrelation } from "../../context/correlation.js";
import { createMemorySink, type MemorySink } from "../../metrics/sinks.js";
import { ObservabilityDispatcher } from "../../observability/dispatcher.js";
import { ToolLoggingPolicy } from "../../policy/tool-logging-policy.js";
import { createObservedModel } from "../observed-model.js";

const tokens = { promptTokens: 100, completionTokens: 50 };

function createMockModel(
  parts: LanguageModelV1StreamPart[],
  finishReason = "stop",
  usage: { promptTokens: number; completionTokens: number } = tokens,
): LanguageModelV1 {
  return {
    specificationVersion: "v1" as const,
    provider: "test",
    modelId: "model-test",
    defaultObjectGenerationMode: undefined,
    doStream: vi.fn(async () => ({
      stream: new ReadableStream<LanguageModelV1StreamPart>({
        start(controller) {
          for (const part of parts) controller.enqueue(part);
          controller.close();
        },
      }),
      rawCall: { rawPrompt: null, rawSettings: {} },
    })),
    doGenerate: vi.fn(async () => ({
      text: "ok",
      finishReason,
      usage,
      rawCall: { rawPrompt: null, rawSettings: {} },
    })),
  } as unknown as LanguageModelV1;
}

function createFailingModel(error: Error): LanguageModelV1 {
  return {
    specificationVersion: "v1" as const,
    provider: "test",
    modelId: "model-failing",
    defaultObjectGenerationMode: undefined,
    doStream: vi.fn(async () => {
      throw error;
    }),
    doGenerate: vi.fn(async () => {
      throw error;
    }),
  } as unknown as LanguageModelV1;
}

const callOpts = {
  inputFormat: "messages" as const,
  mode: { type: "regular" as const },
  prompt: [],
} as Parameters<LanguageModelV1["doGenerate"]>[0];

const finishPart: LanguageModelV1StreamPart = {
  type: "finish",
  finishReason: "stop",
  usage: tokens,
};

async function drain(stream: ReadableStream<LanguageModelV1StreamPart>): Promise<LanguageModelV1StreamPart[]> {
  const reader = stream.getReader();
  const parts: LanguageModelV1StreamPart[] = [];
  for (;;) {
    const { done, value } = await reader.read();
    if (done) return parts;
    parts.push(value);
  }
}

describe("createObservedModel", () => {
  let sink: MemorySink;
  let dispatcher: ObservabilityDispatcher;

  beforeEach(() => {
    sink = createMemorySink("mid");
    dispatcher = new ObservabilityDispatcher({ sinks: [sink], policy: new ToolLoggingPolicy([]) });
  });

  it("keeps the wrapped model's identity", () => {
    const model = createObservedModel(createMockModel([]), dispatcher, { modelVersion: "2026-01" });
    expect(model.modelId).toBe("model-test");
    expect(model.provider).toBe("test");
  });

  it("reports start, usage and end around doGenerate", async () => {
    const inner = createMockModel([]);
    const model = createObservedModel(inner, dispatcher, { modelVersion: "2026-01" });

    const result = await runWithCorrelation("run_gen", () => model.doGenerate(callOpts));

    expect(result.text).toBe("ok");
    expect(sink.events.map((e) => e.kind)).toEqual(["llm.start", "llm.usage", "llm.end"]);
    expect(sink.events[0]).toMatchObject({ model: "model-test", modelVersion: "2026-01", promptSizeBytes: 2 });
    expect(sink.events[1]).toMatchObject({ tokensPrompt: 100, tokensCompletion: 50, tokensTotal: 150 });
    expect(sink.events[2]).toMatchObject({ status: "ok" });
    expect(dispatcher.ledger.summarize("run_gen").tokensSuccessful).toBe(150);
  });

  it("counts a call that finished with an error as failed", async () => {
    const model = createObservedModel(createMockModel([], "error"), dispatcher);

    await runWithCorrelation("run_err", () => model.doGenerate(callOpts));

    expect(sink.events[2]).toMatchObject({ kind: "llm.end", status: "error" });
    expect(dispatcher.ledger.summarize("run_err")).toMatchObject({
      tokensSuccessful: 0,
      tokensBillableEstimate: 150,
      failedCalls: 1,
    });
  });

  it("reports missing usage as zero tokens", async () => {
    const model = createObservedModel(createMockModel([], "stop", { promptTokens: NaN, completionTokens: NaN }), dispatcher);

    await runWithCorrelation("run_nan", () => model.doGenerate(callOpts));

    expect(sink.events.map((e) => e.kind)).toEqual(["llm.start", "llm.usage", "llm.end"]);
    expect(sink.events[1]).toMatchObject({ tokensPrompt: 0, tokensCompletion: 0, tokensTotal: 0 });
  });

  it("reports missing stream usage as zero tokens", async () => {
    const model = createObservedModel(
      createMockModel([{ type: "finish", finishReason: "stop", usage: { promptTokens: NaN, completionTokens: 7 } }]),
      dispatcher,
    );

    const { stream } = await runWithCorrelation("run_nan_stream", () => model.doStream(callOpts));
    await drain(stream);

    expect(sink.events[1]).toMatchObject({ kind: "llm.usage", tokensPrompt: 0, tokensCompletion: 7, tokensTotal: 7 });
  });

  it("reports llm.error and rethrows when the call throws", async () => {
    const boom = new Error("rate limited");
    const model = createObservedModel(createFailingModel(boom), dispatcher);

    await expect(runWithCorrelation("run_throw", () => model.doGenerate(callOpts))).rejects.toBe(boom);

    expect(sink.events.map((e) => e.kind)).toEqual(["llm.start", "llm.error"]);
    expect(sink.events[1]).toMatchObject({ errorKind: "Error", message: "rate limited" });
    expect(dispatcher.inFlightCount()).toBe(0);
  });

  it("ends an aborted call as cancelled", async () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const model = createObservedModel(createFailingModel(abort), dispatcher);

    await expect(runWithCorrelation("run_abort", () => model.doGenerate(callOpts))).rejects.toBe(abort);

    expect(sink.events[1]).toMatchObject({ kind: "llm.end", status: "cancelled" });
  });

  it("reports stream usage under the run that started the call", async () => {
    const model = createObservedModel(
      createMockModel([{ type: "text-delta", textDelta: "hi" }, finishPart]),
      dispatcher,
    );

    const { stream } = await runWithCorrelation("run_stream", () => model.doStream(callOpts));
    const parts = await drain(stream);

    expect(parts.map((p) => p.type)).toEqual(["text-delta", "finish"]);
    expect(sink.events.map((e) => [e.kind, e.runId])).toEqual([
      ["llm.start", "run_stream"],
      ["llm.usage", "run_stream"],
      ["llm.end", "run_stream"],
    ]);
  });

  it("reports an error part once", async () => {
    const model = createObservedModel(
      createMockModel([{ type: "error", error: new Error("stream broke") }]),
      dispatcher,
    );

    const { stream } = await runWithCorrelation("run_stream_err", () => model.doStream(callOpts));
    await drain(stream);

    expect(sink.events.map((e) => e.kind)).toEqual(["llm.start", "llm.error"]);
  });

  it("ends a stream without a finish part as ok", async () => {
    const model = createObservedModel(createMockModel([{ type: "text-delta", textDelta: "x" }]), dispatcher);

    const { stream } = await runWithCorrelation("run_stream_eof", () => model.doStream(callOpts));
    await drain(stream);

    expect(sink.events.map((e) => e.kind)).toEqual(["llm.start", "llm.end"]);
  });
});
