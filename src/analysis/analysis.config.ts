import { hashCanonical } from "../common/canonical-json.js";
import type { JsonObject } from "../data/index.js";
import { InvalidAnalysisConfigError } from "../errors/index.js";
import type { AnalysisConfigInput, CategoryDefinition } from "./analysis.schema.js";

export const ANALYSIS_DEFAULTS = {
  model: "gpt-4o-mini",
  temperature: 0.3,
  include_reasoning: true,
  include_confidence: true,
} as const;

export const DEFAULT_ANALYSIS_TYPE = "classification";

/**
 * Fully merged analysis settings. Optional fields stay absent unless some
 * layer set them, so they do not take part in the content hash.
 */
export interface EffectiveAnalysisConfig {
  analysis_type?: string;
  categories?: CategoryDefinition[];
  model: string;
  temperature: number;
  include_reasoning: boolean;
  include_confidence: boolean;
  confidence_threshold?: number;
  max_tokens?: number;
  multi_label?: boolean;
  custom_prompt?: string;
  additional_fields?: Record<string, unknown>;
}

type Layer = AnalysisConfigInput | null | undefined;

function latest<K extends keyof AnalysisConfigInput>(layers: Layer[], key: K): AnalysisConfigInput[K] {
  let value: AnalysisConfigInput[K] = undefined;
  for (const layer of layers) {
    const candidate = layer?.[key];
    if (candidate !== undefined) {
      value = candidate;
    }
  }
  return value;
}

/**
 * Merges configuration layers field by field. Later layers win:
 * saved configuration, then inline configuration, then overrides. Defaults
 * fill whatever no layer set.
 */
export function mergeAnalysisConfig(
  saved: Layer,
  inline: Layer,
  overrides: Layer,
): EffectiveAnalysisConfig {
  const layers = [saved, inline, overrides];
  const categories = latest(layers, "categories");
  const analysisType = latest(layers, "analysis_type");
  if ((categories === undefined || categories.length === 0) && analysisType === undefined) {
    throw new InvalidAnalysisConfigError("Configuration must include categories or analysis_type");
  }

  const merged: EffectiveAnalysisConfig = {
    analysis_type: analysisType,
    categories,
    model: latest(layers, "model") ?? ANALYSIS_DEFAULTS.model,
    temperature: latest(layers, "temperature") ?? ANALYSIS_DEFAULTS.temperature,
    include_reasoning: latest(layers, "include_reasoning") ?? ANALYSIS_DEFAULTS.include_reasoning,
    include_confidence: latest(layers, "include_confidence") ?? ANALYSIS_DEFAULTS.include_confidence,
    confidence_threshold: latest(layers, "confidence_threshold"),
    max_tokens: latest(layers, "max_tokens"),
    multi_label: latest(layers, "multi_label"),
    custom_prompt: latest(layers, "custom_prompt"),
    additional_fields: latest(layers, "additional_fields"),
  };
  return merged;
}

/** Content hash of a configuration; independent of key order. */
export function hashAnalysisConfig(config: EffectiveAnalysisConfig): string {
  return hashCanonical(config);
}

/** JSON form stored as the result's configuration snapshot. */
export function toConfigSnapshot(config: EffectiveAnalysisConfig): JsonObject {
  const snapshot: JsonObject = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}
