import { z } from 'zod';

// Only the full name is mutable today; blank values count as "not supplied".
export const updateProfileSchema = z.object({
  fullName: z.string().trim().max(120).optional(),
});

export type UpdateProfileDto = z.infer<typeof updateProfileSchema>;
