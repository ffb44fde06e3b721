import { z } from "zod";

const TokenCount = z.number().int().nonnegative().catch(0).default(0);

/**
 * Token usage block as reported by the upstream API. Missing or malformed
 * counters read as zero.
 */
export const UsageReportSchema = z.object({
  input_tokens: TokenCount,
  output_tokens: TokenCount,
  output_tokens_details: z
    .object({ reasoning_tokens: TokenCount })
    .nullish()
    .catch(null),
  total_tokens: z.number().int().nonnegative().nullish().catch(null),
});

export interface UsageReport {
  inputTokens: number;
  outputTokens: number;
  reasoningTokens: number;
  totalTokens: number;
}

export function parseUsage(value: unknown): UsageReport | null {
  const result = UsageReportSchema.safeParse(value);
  if (!result.success) return null;
  const usage = result.data;
  return {
    inputTokens: usage.input_tokens,
    outputTokens: usage.output_tokens,
    reasoningTokens: usage.output_tokens_details?.reasoning_tokens ?? 0,
    totalTokens: usage.total_tokens ?? usage.input_tokens + usage.output_tokens,
  };
}
