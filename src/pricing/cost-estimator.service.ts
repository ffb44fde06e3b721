import { Injectable, Logger } from "@nestjs/common";
import { divideHalfEven, formatMicros } from "./money.js";
import { DEFAULT_RATE, MODEL_RATES, type ModelRate } from "./pricing.rates.js";

const TOKENS_PER_RATE_UNIT = 1_000_000n;

export interface CostEstimate {
  micros: bigint;
  /** Decimal USD with six places, ready for a numeric(10,6) column */
  usd: string;
  rate: ModelRate;
  pricedAs: string | null;
}

@Injectable()
export class CostEstimator {
  private readonly logger = new Logger(CostEstimator.name);
  private readonly prefixes = Object.keys(MODEL_RATES).sort((a, b) => b.length - a.length);

  estimate(model: string, inputTokens: number, outputTokens: number): CostEstimate {
    const pricedAs = this.matchModel(model);
    const rate = pricedAs ? MODEL_RATES[pricedAs] : undefined;
    if (!pricedAs || !rate) {
      this.logger.warn(`No pricing for model ${model}, using default rate`);
      return this.compute(DEFAULT_RATE, null, inputTokens, outputTokens);
    }
    return this.compute(rate, pricedAs, inputTokens, outputTokens);
  }

  private compute(
    rate: ModelRate,
    pricedAs: string | null,
    inputTokens: number,
    outputTokens: number,
  ): CostEstimate {
    const scaled =
      BigInt(Math.max(0, Math.trunc(inputTokens))) * rate.input +
      BigInt(Math.max(0, Math.trunc(outputTokens))) * rate.output;
    const micros = divideHalfEven(scaled, TOKENS_PER_RATE_UNIT);
    return { micros, usd: formatMicros(micros), rate, pricedAs };
  }

  // Exact name first, then the longest known prefix
  private matchModel(model: string): string | null {
    const normalized = model.trim().toLowerCase();
    if (normalized in MODEL_RATES) return normalized;
    return this.prefixes.find((prefix) => normalized.startsWith(prefix)) ?? null;
  }
}
