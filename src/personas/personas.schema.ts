import { z } from "zod";

const PersonaName = z
  .string()
  .trim()
  .min(1, "name is required")
  .max(255, "name must be at most 255 characters");

export const CreatePersonaInputSchema = z.object({
  name: PersonaName,
  description: z.string().nullish(),
  content: z.string().min(1, "content is required"),
  user_id: z.string().trim().min(1).max(255).nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
});

export const UpdatePersonaInputSchema = z.object({
  name: PersonaName.optional(),
  description: z.string().nullish(),
  content: z.string().min(1, "content cannot be empty").optional(),
  user_id: z.string().trim().min(1).max(255).nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
  is_active: z.boolean().optional(),
});

export const ListPersonasQuerySchema = z.object({
  user_id: z.string().optional(),
  include_inactive: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export type CreatePersonaInput = z.infer<typeof CreatePersonaInputSchema>;
export type UpdatePersonaInput = z.infer<typeof UpdatePersonaInputSchema>;
export type ListPersonasQuery = z.infer<typeof ListPersonasQuerySchema>;
