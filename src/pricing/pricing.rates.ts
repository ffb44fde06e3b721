/**
 * USD per one million tokens, in micro-dollars (1 USD = 1_000_000).
 * Dated snapshots ("gpt-4o-2024-08-06") resolve through prefix matching.
 */
export interface ModelRate {
  input: bigint;
  output: bigint;
}

export const MODEL_RATES: Readonly<Record<string, ModelRate>> = {
  "gpt-4o": { input: 2_500_000n, output: 10_000_000n },
  "gpt-4o-mini": { input: 150_000n, output: 600_000n },
  o1: { input: 15_000_000n, output: 60_000_000n },
  "o1-mini": { input: 3_000_000n, output: 12_000_000n },
  "gpt-4-turbo": { input: 10_000_000n, output: 30_000_000n },
  "gpt-4": { input: 30_000_000n, output: 60_000_000n },
  "gpt-3.5-turbo": { input: 500_000n, output: 1_500_000n },
};

export const DEFAULT_RATE: ModelRate = { input: 1_000_000n, output: 2_000_000n };
