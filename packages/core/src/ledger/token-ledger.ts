import { reportObservabilityFailure } from "../best-effort.js";

export interface TokenUsage {
  tokensPrompt: number;
  tokensCompletion: number;
}

export interface LedgerEntry extends TokenUsage {
  readonly succeeded: boolean;
}

export interface ModelPricing {
  costPerMInputTokens: number;
  costPerMOutputTokens: number;
}

export interface TokenSummary {
  runId: string;
  /** Tokens of calls that produced a usable result. */
  tokensSuccessful: number;
  /** Tokens of every call, failed ones included: they still consumed provider capacity. */
  tokensBillableEstimate: number;
  calls: number;
  failedCalls: number;
  estimatedCostUsd?: number;
}

function sanitizeCount(value: number, field: string): number {
  if (Number.isFinite(value) && value >= 0) return Math.floor(value);
  reportObservabilityFailure("token ledger record", new Error(`Invalid ${field}: ${String(value)}`));
  return 0;
}

/**
 * Append-only token accounting, partitioned by run. Entries are never
 * changed once recorded; a run's entries are dropped only by `reset`.
 *
 * All mutation happens synchronously on the event loop, so concurrent
 * invocations within a run cannot interleave inside `record`.
 */
export class TokenLedger {
  private readonly entries = new Map<string, LedgerEntry[]>();

  constructor(private readonly pricing?: ModelPricing) {}

  record(runId: string, usage: TokenUsage, succeeded: boolean): void {
    const entry: LedgerEntry = Object.freeze({
      tokensPrompt: sanitizeCount(usage.tokensPrompt, "tokensPrompt"),
      tokensCompletion: sanitizeCount(usage.tokensCompletion, "tokensCompletion"),
      succeeded,
    });
    const list = this.entries.get(runId);
    if (list) {
      list.push(entry);
    } else {
      this.entries.set(runId, [entry]);
    }
  }

  /** Totals for a run. An unknown run yields zeros, not an error. */
  summarize(runId: string): TokenSummary {
    const list = this.entries.get(runId) ?? [];
    let tokensSuccessful = 0;
    let tokensBillableEstimate = 0;
    let failedCalls = 0;
    let promptTokens = 0;
    let completionTokens = 0;

    for (const entry of list) {
      const total = entry.tokensPrompt + entry.tokensCompletion;
      tokensBillableEstimate += total;
      promptTokens += entry.tokensPrompt;
      completionTokens += entry.tokensCompletion;
      if (entry.succeeded) {
        tokensSuccessful += total;
      } else {
        failedCalls++;
      }
    }

    const summary: TokenSummary = {
      runId,
      tokensSuccessful,
      tokensBillableEstimate,
      calls: list.length,
      failedCalls,
    };
    if (this.pricing) {
      summary.estimatedCostUsd =
        (promptTokens / 1_000_000) * this.pricing.costPerMInputTokens +
        (completionTokens / 1_000_000) * this.pricing.costPerMOutputTokens;
    }
    return summary;
  }

  entriesFor(runId: string): readonly LedgerEntry[] {
    return [...(this.entries.get(runId) ?? [])];
  }

  reset(runId: string): void {
    this.entries.delete(runId);
  }

  runIds(): string[] {
    return [...this.entries.keys()];
  }
}
