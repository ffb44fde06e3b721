import { describe, expect, it } from "vitest";
import {
  hashAnalysisConfig,
  mergeAnalysisConfig,
  toConfigSnapshot,
} from "../../src/analysis/analysis.config.js";
import { buildAnalysisPrompt, extractInputText, extractOutputText } from "../../src/analysis/analysis.prompt.js";
import { AnalyzeRequestSchema, CreateAnalysisConfigInputSchema } from "../../src/analysis/analysis.schema.js";
import { InvalidAnalysisConfigError } from "../../src/errors/index.js";

const SUPPORT = { name: "technical_support", description: "Login and account problems", examples: [] };
const BILLING = { name: "billing", description: "Payments and invoices", examples: ["refund"] };

describe("mergeAnalysisConfig", () => {
  it("should fill defaults for unset fields", () => {
    const config = mergeAnalysisConfig(undefined, { categories: [SUPPORT] }, undefined);

    expect(config).toMatchObject({
      model: "gpt-4o-mini",
      temperature: 0.3,
      include_reasoning: true,
      include_confidence: true,
    });
    expect(config.max_tokens).toBeUndefined();
  });

  it("should let overrides win over inline config and inline over saved", () => {
    const config = mergeAnalysisConfig(
      { analysis_type: "support", categories: [SUPPORT], model: "gpt-4o", temperature: 0.1 },
      { temperature: 0.5, max_tokens: 300 },
      { temperature: 0.9 },
    );

    expect(config.temperature).toBe(0.9);
    expect(config.model).toBe("gpt-4o");
    expect(config.max_tokens).toBe(300);
    expect(config.analysis_type).toBe("support");
  });

  it("should replace the category list as a whole", () => {
    const config = mergeAnalysisConfig({ categories: [SUPPORT, BILLING] }, undefined, { categories: [BILLING] });

    expect(config.categories).toEqual([BILLING]);
  });

  it("should reject a configuration without categories or analysis type", () => {
    expect(() => mergeAnalysisConfig(undefined, { model: "gpt-4o" }, undefined)).toThrow(
      InvalidAnalysisConfigError,
    );
    expect(() => mergeAnalysisConfig(undefined, { categories: [] }, undefined)).toThrow(
      "Configuration must include categories or analysis_type",
    );
  });

  it("should accept an analysis type alone", () => {
    expect(mergeAnalysisConfig(undefined, { analysis_type: "sentiment" }, undefined).analysis_type).toBe(
      "sentiment",
    );
  });
});

describe("hashAnalysisConfig", () => {
  it("should not depend on key order", () => {
    const a = mergeAnalysisConfig(undefined, { categories: [SUPPORT], temperature: 0.2 }, undefined);
    const b = mergeAnalysisConfig(
      undefined,
      {
        temperature: 0.2,
        categories: [{ examples: [], description: SUPPORT.description, name: SUPPORT.name }],
      },
      undefined,
    );

    expect(hashAnalysisConfig(a)).toBe(hashAnalysisConfig(b));
    expect(hashAnalysisConfig(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should change when any effective field changes", () => {
    const a = mergeAnalysisConfig(undefined, { categories: [SUPPORT] }, undefined);
    const b = mergeAnalysisConfig(undefined, { categories: [SUPPORT] }, { temperature: 0.4 });

    expect(hashAnalysisConfig(a)).not.toBe(hashAnalysisConfig(b));
  });

  it("should equal the hash of an explicit default", () => {
    const implicit = mergeAnalysisConfig(undefined, { categories: [SUPPORT] }, undefined);
    const explicit = mergeAnalysisConfig(undefined, { categories: [SUPPORT], model: "gpt-4o-mini" }, undefined);

    expect(hashAnalysisConfig(implicit)).toBe(hashAnalysisConfig(explicit));
  });
});

describe("toConfigSnapshot", () => {
  it("should leave out unset optional fields", () => {
    const snapshot = toConfigSnapshot(mergeAnalysisConfig(undefined, { analysis_type: "sentiment" }, undefined));

    expect(snapshot).toEqual({
      analysis_type: "sentiment",
      model: "gpt-4o-mini",
      temperature: 0.3,
      include_reasoning: true,
      include_confidence: true,
    });
  });
});

describe("AnalyzeRequestSchema", () => {
  it("should require config_id or config", () => {
    const result = AnalyzeRequestSchema.safeParse({ id: "req_1" });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("Either config_id or config must be provided");
  });

  it("should default category descriptions and examples", () => {
    const result = AnalyzeRequestSchema.safeParse({
      id: "req_1",
      config: { categories: [{ name: "billing" }] },
    });

    expect(result.success).toBe(true);
    expect(result.data?.config?.categories).toEqual([{ name: "billing", description: "", examples: [] }]);
  });

  it("should reject an analysis type longer than 50 characters", () => {
    const result = AnalyzeRequestSchema.safeParse({
      id: "req_1",
      config: { analysis_type: "x".repeat(51), categories: [SUPPORT] },
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["config", "analysis_type"]);
  });
});

describe("CreateAnalysisConfigInputSchema", () => {
  it("should bound the stored analysis type to 50 characters", () => {
    const config = (analysisType: string) => ({
      name: "triage",
      config: { analysis_type: analysisType, categories: [BILLING] },
    });

    expect(CreateAnalysisConfigInputSchema.safeParse(config("x".repeat(50))).success).toBe(true);
    expect(CreateAnalysisConfigInputSchema.safeParse(config("x".repeat(51))).success).toBe(false);
  });
});

describe("analysis prompt", () => {
  it("should substitute placeholders in a custom prompt", () => {
    const config = mergeAnalysisConfig(
      undefined,
      { categories: [BILLING], custom_prompt: "Q: {user_input}\nA: {ai_response}\n{categories}" },
      undefined,
    );

    expect(buildAnalysisPrompt("Where is my refund?", "It is on its way.", config)).toBe(
      "Q: Where is my refund?\nA: It is on its way.\n- billing: Payments and invoices (Examples: refund)",
    );
  });

  it("should list every category in the default prompt", () => {
    const config = mergeAnalysisConfig(undefined, { categories: [SUPPORT, BILLING] }, undefined);

    const prompt = buildAnalysisPrompt("I can't log in", "Let's reset your password", config);

    expect(prompt).toContain("User Message: I can't log in");
    expect(prompt).toContain("- technical_support: Login and account problems\n- billing: Payments and invoices");
  });

  it("should read text from message lists and output arrays", () => {
    expect(
      extractInputText({
        input: [
          { role: "user", content: "first" },
          { role: "user", content: [{ type: "input_text", text: "second" }] },
        ],
      }),
    ).toBe("first\nsecond");
    expect(
      extractOutputText({
        output: [{ type: "message", content: [{ type: "output_text", text: "answer" }] }],
      }),
    ).toBe("answer");
  });
});
