import { z } from "zod";

/**
 * Responses API request body. Unknown fields pass through to upstream.
 */
export const ResponsesRequestSchema = z
  .object({
    model: z.string().min(1, "model is required"),
    input: z.union([z.string(), z.array(z.unknown())]),
    stream: z.boolean().nullish(),
    instructions: z.string().nullish(),
    persona_id: z.string().uuid("Invalid persona ID format").nullish(),
  })
  .passthrough();

export type ResponsesRequest = z.infer<typeof ResponsesRequestSchema>;

export const RateRequestSchema = z.object({
  rating: z.union([z.literal(1), z.literal(-1)], {
    errorMap: () => ({ message: "rating must be 1 or -1" }),
  }),
  feedback: z.string().max(10_000).nullish(),
});

export type RateRequest = z.infer<typeof RateRequestSchema>;
