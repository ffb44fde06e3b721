import { z } from "zod";

export const CreateCredentialInputSchema = z.object({
  openai_api_key: z.string().trim().min(1, "openai_api_key is required"),
  user_id: z.string().trim().min(1).max(255).nullish(),
  name: z.string().max(255).nullish(),
  description: z.string().nullish(),
});

export const UpdateCredentialInputSchema = z.object({
  is_active: z.boolean().optional(),
  user_id: z.string().trim().min(1).max(255).nullish(),
  name: z.string().max(255).nullish(),
  description: z.string().nullish(),
  openai_api_key: z.string().trim().min(1).optional(),
});

export type CreateCredentialInput = z.infer<typeof CreateCredentialInputSchema>;
export type UpdateCredentialInput = z.infer<typeof UpdateCredentialInputSchema>;
