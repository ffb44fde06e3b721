import { z } from "zod";

export const ExternalIdSchema = z
  .string()
  .trim()
  .min(1, "user_id is required")
  .max(255, "user_id must be at most 255 characters");

export const CreatePrincipalInputSchema = z.object({
  user_id: ExternalIdSchema,
});

export type CreatePrincipalInput = z.infer<typeof CreatePrincipalInputSchema>;
