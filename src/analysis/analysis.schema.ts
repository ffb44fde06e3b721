import { z } from "zod";

export const CategoryDefinitionSchema = z.object({
  name: z.string().min(1, "category name is required"),
  description: z.string().default(""),
  examples: z.array(z.string()).default([]),
});

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

/**
 * Any subset of analysis settings. Saved configurations, inline
 * configurations and overrides all share this shape.
 */
export const AnalysisConfigInputSchema = z.object({
  analysis_type: z.string().min(1).max(50).optional(),
  categories: z.array(CategoryDefinitionSchema).optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  include_reasoning: z.boolean().optional(),
  include_confidence: z.boolean().optional(),
  confidence_threshold: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  multi_label: z.boolean().optional(),
  custom_prompt: z.string().min(1).optional(),
  additional_fields: z.record(z.unknown()).optional(),
});

export type AnalysisConfigInput = z.infer<typeof AnalysisConfigInputSchema>;

/** A stored configuration names its type and at least one category. */
export const AnalysisConfigDataSchema = AnalysisConfigInputSchema.extend({
  analysis_type: z.string().min(1, "analysis_type is required").max(50),
  categories: z.array(CategoryDefinitionSchema).min(1, "at least one category is required"),
});

export const AnalyzeRequestSchema = z
  .object({
    id: z.string().min(1, "id is required"),
    config_id: z.string().uuid().optional(),
    config: AnalysisConfigInputSchema.optional(),
    config_overrides: AnalysisConfigInputSchema.optional(),
  })
  .refine((value) => value.config_id !== undefined || value.config !== undefined, {
    message: "Either config_id or config must be provided",
  });

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export const CreateAnalysisConfigInputSchema = z.object({
  name: z.string().min(1, "name is required").max(255),
  description: z.string().nullish(),
  config: AnalysisConfigDataSchema,
});

export type CreateAnalysisConfigInput = z.infer<typeof CreateAnalysisConfigInputSchema>;

export const UpdateAnalysisConfigInputSchema = z.object({
  name: z.string().min(1).max(255).optional(),
  description: z.string().nullish(),
  config: AnalysisConfigDataSchema.optional(),
  is_active: z.boolean().optional(),
});

export type UpdateAnalysisConfigInput = z.infer<typeof UpdateAnalysisConfigInputSchema>;

export const ListAnalysisConfigsQuerySchema = z.object({
  include_inactive: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(50),
});

export type ListAnalysisConfigsQuery = z.infer<typeof ListAnalysisConfigsQuerySchema>;

/** Structured output requested from the upstream model. */
export const AnalysisOutputSchema = z.object({
  primary_category: z.string(),
  categories: z.array(z.object({ name: z.string(), confidence: z.number() })),
  reasoning: z.string(),
  metadata: z.object({
    sentiment: z.string(),
    urgency: z.string(),
    topics: z.array(z.string()),
  }),
});

export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>;
