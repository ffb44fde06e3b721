import { z } from "zod";

export const CreateOrganizationInputSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "name is required")
    .max(255, "name must be at most 255 characters"),
});

export type CreateOrganizationInput = z.infer<typeof CreateOrganizationInputSchema>;
