import { isPlainObject } from "../common/canonical-json.js";
import type { JsonObject } from "../data/index.js";
import type { EffectiveAnalysisConfig } from "./analysis.config.js";
import type { CategoryDefinition } from "./analysis.schema.js";

const MAX_EXAMPLES = 3;

/** Strict JSON schema the upstream model must answer with. */
export const ANALYSIS_RESPONSE_FORMAT = {
  type: "json_schema",
  name: "analysis_response",
  strict: true,
  schema: {
    type: "object",
    properties: {
      primary_category: { type: "string" },
      categories: {
        type: "array",
        items: {
          type: "object",
          properties: {
            name: { type: "string" },
            confidence: { type: "number" },
          },
          required: ["name", "confidence"],
          additionalProperties: false,
        },
      },
      reasoning: { type: "string" },
      metadata: {
        type: "object",
        properties: {
          sentiment: { type: "string" },
          urgency: { type: "string" },
          topics: { type: "array", items: { type: "string" } },
        },
        required: ["sentiment", "urgency", "topics"],
        additionalProperties: false,
      },
    },
    required: ["primary_category", "categories", "reasoning", "metadata"],
    additionalProperties: false,
  },
} as const;

/**
 * Collects the text parts of a Responses API `output` array
 * (`output[].content[].text`).
 */
export function extractOutputText(document: JsonObject | null): string {
  const output = document?.["output"];
  if (!Array.isArray(output)) return "";
  const parts: string[] = [];
  for (const item of output) {
    if (!isPlainObject(item) || !Array.isArray(item["content"])) continue;
    for (const content of item["content"]) {
      if (isPlainObject(content) && typeof content["text"] === "string") {
        parts.push(content["text"]);
      }
    }
  }
  return parts.join("\n");
}

/** The caller's input as plain text, from a string or a list of input messages. */
export function extractInputText(payload: JsonObject): string {
  const input = payload["input"];
  if (typeof input === "string") return input;
  if (!Array.isArray(input)) return "";
  const parts: string[] = [];
  for (const item of input) {
    if (typeof item === "string") {
      parts.push(item);
    } else if (isPlainObject(item)) {
      const content = item["content"];
      if (typeof content === "string") {
        parts.push(content);
      } else if (Array.isArray(content)) {
        for (const part of content) {
          if (isPlainObject(part) && typeof part["text"] === "string") {
            parts.push(part["text"]);
          }
        }
      }
    }
  }
  return parts.join("\n");
}

export function formatCategories(categories: CategoryDefinition[]): string {
  return categories
    .map((category) => {
      let line = `- ${category.name}: ${category.description}`;
      if (category.examples.length > 0) {
        line += ` (Examples: ${category.examples.slice(0, MAX_EXAMPLES).join(", ")})`;
      }
      return line;
    })
    .join("\n");
}

export function buildAnalysisPrompt(
  userInput: string,
  aiResponse: string,
  config: EffectiveAnalysisConfig,
): string {
  const categories = config.categories ?? [];
  const categoriesText = formatCategories(categories);

  if (config.custom_prompt) {
    return config.custom_prompt
      .replaceAll("{user_input}", userInput)
      .replaceAll("{ai_response}", aiResponse)
      .replaceAll("{categories}", categoriesText);
  }

  const names = categories.map((category) => category.name);
  const exampleCategories = names
    .slice(0, 2)
    .map((name) => `{"name": "${name}", "confidence": 0.0}`)
    .join(", ");
  const focus = config.analysis_type ? ` The analysis type is "${config.analysis_type}".` : "";

  return `Analyze the following conversation and classify it according to the given categories.${focus}

User Message: ${userInput}

AI Response: ${aiResponse}

Categories:
${categoriesText}

Analyze this conversation and provide:
1. The primary category that best matches from the categories listed above
2. Confidence score (0.0 to 1.0) for EACH of the categories listed above
3. Brief reasoning for the classification

You MUST include ALL categories in your response with their confidence scores.

Respond in JSON format:
{
    "primary_category": "${names[0] ?? "category_name"}",
    "categories": [${exampleCategories}],
    "reasoning": "Brief explanation of why this category was chosen",
    "metadata": {
        "sentiment": "positive/neutral/negative",
        "urgency": "low/medium/high",
        "topics": ["relevant", "topics", "from", "conversation"]
    }
}

IMPORTANT: The "categories" array must include ALL the categories listed above, each with its name and confidence score.`;
}
