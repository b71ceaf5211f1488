import { z } from 'zod';
import { Role } from '../../users/enums/role.enum';

export const registerSchema = z.object({
  fullName: z.string().trim().min(1, 'fullName is required').max(120),
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(8, 'password must be at least 8 characters'),
  role: z.nativeEnum(Role).optional(),
  phone: z.string().trim().min(1).max(32).optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase(),
  password: z.string(),
});

export type RegisterDto = z.infer<typeof registerSchema>;
export type LoginDto = z.infer<typeof loginSchema>;
