import type { ProviderOperation } from "./errors.js";

const TOKENS_PER_WORD = 1.3;

export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0).length;
  return Math.ceil(words * TOKENS_PER_WORD);
}

export type CostEntry = {
  provider: string;
  operation: ProviderOperation;
  calls: number;
  tokens: number;
  usd: number;
};

export type CostEstimate = {
  totalUsd: number;
  totalTokens: number;
  totalCalls: number;
  entries: CostEntry[];
};

function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

/** Running tally of estimated spend, keyed by provider and operation. */
export class CostLedger {
  private readonly entries = new Map<string, CostEntry>();

  record(args: { provider: string; operation: ProviderOperation; usdPer1kTokens: number; inputText: string; outputText: string }): void {
    const tokens = estimateTokens(args.inputText) + estimateTokens(args.outputText);
    const key = `${args.provider}:${args.operation}`;
    const prev = this.entries.get(key) ?? { provider: args.provider, operation: args.operation, calls: 0, tokens: 0, usd: 0 };
    this.entries.set(key, {
      ...prev,
      calls: prev.calls + 1,
      tokens: prev.tokens + tokens,
      usd: roundUsd(prev.usd + (tokens / 1000) * args.usdPer1kTokens)
    });
  }

  snapshot(): CostEstimate {
    const entries = [...this.entries.values()]
      .map((e) => ({ ...e }))
      .sort((a, b) => a.provider.localeCompare(b.provider) || a.operation.localeCompare(b.operation));
    return {
      totalUsd: roundUsd(entries.reduce((acc, e) => acc + e.usd, 0)),
      totalTokens: entries.reduce((acc, e) => acc + e.tokens, 0),
      totalCalls: entries.reduce((acc, e) => acc + e.calls, 0),
      entries
    };
  }
}
