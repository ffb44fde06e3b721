import { describe, expect, it } from "vitest";
import { formatZodError } from "../../src/common/validation.utils.js";
import { ResponsesRequestSchema } from "../../src/relay/relay.schema.js";

describe("ResponsesRequestSchema", () => {
  it("should keep unknown fields for upstream", () => {
    const result = ResponsesRequestSchema.safeParse({ model: "gpt-4o", input: "Hi", temperature: 0.2 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ model: "gpt-4o", input: "Hi", temperature: 0.2 });
    }
  });

  it("should accept a UUID persona id", () => {
    const result = ResponsesRequestSchema.safeParse({
      model: "gpt-4o",
      input: "Hi",
      persona_id: "3f2b8c1e-9d4a-4e6b-8a7c-1b2d3e4f5a6b",
    });

    expect(result.success).toBe(true);
  });

  it("should reject a persona id that is not a UUID", () => {
    const result = ResponsesRequestSchema.safeParse({ model: "gpt-4o", input: "Hi", persona_id: "abc" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe("persona_id: Invalid persona ID format");
    }
  });
});
