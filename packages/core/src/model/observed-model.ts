import { randomUUID } from "node:crypto";
import type { LanguageModelV1, LanguageModelV1StreamPart } from "ai";
import { bestEffort } from "../best-effort.js";
import { currentRunId, runWithCorrelation } from "../context/correlation.js";
import type { ObservabilityDispatcher } from "../observability/dispatcher.js";

export interface ObservedModelOptions {
  /** Reported as `modelVersion` on `llm.start`. */
  modelVersion?: string;
}

/** Providers that report no usage leave NaN counts. */
function tokenCount(n: number): number {
  return Number.isFinite(n) ? n : 0;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Wraps a LanguageModelV1 so every call reports `llm.start`, token usage and
 * a terminal `llm.end` / `llm.error` to the dispatcher. Results and errors
 * pass through unchanged.
 *
 * - A call that finishes with reason `error` still records its tokens, as failed.
 * - An aborted call ends as `cancelled`.
 * - Stream parts are reported under the run that started the call, whoever reads them.
 */
export function createObservedModel(
  model: LanguageModelV1,
  dispatcher: ObservabilityDispatcher,
  options: ObservedModelOptions = {},
): LanguageModelV1 {
  function start(invocationId: string, prompt: unknown): void {
    dispatcher.llmStart({
      invocationId,
      model: model.modelId,
      modelVersion: options.modelVersion,
      prompt,
    });
  }

  function fail(invocationId: string, err: unknown): void {
    if (isAbortError(err)) {
      dispatcher.llmEnd({ invocationId, status: "cancelled" });
    } else {
      dispatcher.llmError({ invocationId, error: err });
    }
  }

  return {
    specificationVersion: "v1",
    provider: model.provider,
    modelId: model.modelId,
    defaultObjectGenerationMode: model.defaultObjectGenerationMode,
    supportsImageUrls: model.supportsImageUrls,
    supportsStructuredOutputs: model.supportsStructuredOutputs,

    async doGenerate(callOptions) {
      const invocationId = randomUUID();
      start(invocationId, callOptions.prompt);
      try {
        const result = await model.doGenerate(callOptions);
        const succeeded = result.finishReason !== "error";
        dispatcher.llmUsage({
          invocationId,
          tokensPrompt: tokenCount(result.usage.promptTokens),
          tokensCompletion: tokenCount(result.usage.completionTokens),
          succeeded,
        });
        dispatcher.llmEnd({ invocationId, status: succeeded ? "ok" : "error" });
        return result;
      } catch (err) {
        fail(invocationId, err);
        throw err;
      }
    },

    async doStream(callOptions) {
      const invocationId = randomUUID();
      const runId = currentRunId();
      start(invocationId, callOptions.prompt);

      let response: Awaited<ReturnType<LanguageModelV1["doStream"]>>;
      try {
        response = await model.doStream(callOptions);
      } catch (err) {
        fail(invocationId, err);
        throw err;
      }

      let settled = false;
      const settle = (report: () => void): void => {
        if (settled) return;
        settled = true;
        bestEffort("observed stream", () => (runId ? runWithCorrelation(runId, report) : report()));
      };

      const stream = response.stream.pipeThrough(
        new TransformStream<LanguageModelV1StreamPart, LanguageModelV1StreamPart>({
          transform(part, controller) {
            if (part.type === "finish") {
              const { usage } = part;
              const succeeded = part.finishReason !== "error";
              settle(() => {
                dispatcher.llmUsage({
                  invocationId,
                  tokensPrompt: tokenCount(usage.promptTokens),
                  tokensCompletion: tokenCount(usage.completionTokens),
                  succeeded,
                });
                dispatcher.llmEnd({ invocationId, status: succeeded ? "ok" : "error" });
              });
            } else if (part.type === "error") {
              const { error } = part;
              settle(() => fail(invocationId, error));
            }
            controller.enqueue(part);
          },
          flush() {
            settle(() => dispatcher.llmEnd({ invocationId, status: "ok" }));
          },
        }),
      );

      return { ...response, stream };
    },
  };
}
